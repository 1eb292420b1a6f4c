import { getMaxTokens, getTemperatures, getTimeouts } from "@/lib/config";
import { stripCodeFence } from "../core/json";
import { loadPrompt, renderPromptText } from "../prompt";
import { PipelineError, errorMessage } from "../errors";
import { imageReference } from "../images/generate-image";
import type { PipelineContext } from "../node";
import type { ChapterDraft } from "../assemble/ebook-bundle";
import type { OutlineChapter } from "../outline/outline-schema";

export interface WriteChapterInput {
  topic: string;
  research: string;
  chapter: OutlineChapter;
  /** Archive citation the chapter closes with. */
  citation: string;
}

type ChapterStep = "writing" | "translation";

async function callWriter(
  ctx: PipelineContext,
  step: ChapterStep,
  chapterNumber: number,
  promptName: string,
  promptContext: Record<string, unknown>,
  options: { temperature: number; maxTokens: number }
): Promise<string> {
  try {
    const prompt = await loadPrompt(promptName, promptContext);
    const text = await ctx.models.writer.generateText({
      ...prompt,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeoutMs: getTimeouts(ctx.config).textMs,
      log: { taskType: `chapter-${step}`, promptName, chapterNumber },
    });
    const html = stripCodeFence(text);
    if (!html) throw new Error("model returned an empty response");
    return html;
  } catch (err) {
    throw new PipelineError("chapters", errorMessage(err), { chapterNumber, step, cause: err });
  }
}

/**
 * English prose, then its Portuguese translation, while the chapter image
 * is generated alongside.
 */
export async function writeChapter(ctx: PipelineContext, input: WriteChapterInput): Promise<ChapterDraft> {
  const { chapter } = input;
  const temperatures = getTemperatures(ctx.config);
  const maxTokens = getMaxTokens(ctx.config);

  const prose = async () => {
    const contentEn = await callWriter(
      ctx,
      "writing",
      chapter.number,
      "chapter",
      {
        chapter_number: chapter.number,
        chapter_title: chapter.title_en,
        topic: input.topic,
        summary: chapter.summary_en,
        key_points: chapter.key_points,
        research: input.research,
        archive_citation: input.citation,
      },
      { temperature: temperatures.chapter, maxTokens: maxTokens.chapter }
    );
    const contentPt = await callWriter(
      ctx,
      "translation",
      chapter.number,
      "translate_chapter",
      { content: contentEn },
      { temperature: temperatures.translation, maxTokens: maxTokens.translation }
    );
    return { contentEn, contentPt };
  };

  const image = async () => {
    const prompt = await renderPromptText("image", { subject: chapter.title_en });
    return imageReference(ctx, prompt, `chapter_${chapter.number}.png`);
  };

  const [{ contentEn, contentPt }, coverImageUrl] = await Promise.all([prose(), image()]);

  return {
    chapter_number: chapter.number,
    title_en: chapter.title_en,
    title_pt: chapter.title_pt,
    summary_en: chapter.summary_en,
    summary_pt: chapter.summary_pt,
    content_en: contentEn,
    content_pt: contentPt,
    cover_image_url: coverImageUrl,
  };
}
