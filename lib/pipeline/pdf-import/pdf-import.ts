import { defer } from "rxjs";
import { getChapterConcurrency, getPricing } from "@/lib/config";
import { mapWithConcurrency } from "../concurrency";
import { renderPromptText } from "../prompt";
import { renderBlocks } from "../blocks/render-blocks";
import { imageReference } from "../images/generate-image";
import { addNotice, defineNode, reportProgress, resolveNode, type Node, type PipelineContext } from "../node";
import { assembleBundle, type ChapterDraft, type EbookBundle } from "../assemble/ebook-bundle";
import { classificationsNode } from "./classify-pdf";
import { pairChapters, type ChapterPair } from "./pair-chapters";

export const chapterPairsNode: Node<ChapterPair[]> = defineNode<ChapterPair[]>({
  name: "pdf-chapter-pairs",
  resolve: (ctx) =>
    defer(async () => {
      const { en, pt } = await resolveNode(classificationsNode, ctx);
      const { pairs, notices } = pairChapters(en.chapters, pt.chapters);
      for (const notice of notices) {
        console.warn(`[${ctx.runId}] ${notice}`);
        addNotice(ctx, notice);
      }
      return pairs;
    }),
});

async function chapterImagePrompt(ctx: PipelineContext, pair: ChapterPair): Promise<string> {
  if (pair.en.image_prompt.trim()) return pair.en.image_prompt;
  addNotice(ctx, `Chapter ${pair.number} had no image prompt; built one from its title and summary`);
  return renderPromptText("pdf_chapter_image", { title: pair.en.title, summary: pair.en.summary });
}

export interface PdfImages {
  cover: string;
  /** Image reference per chapter number. */
  chapters: Map<number, string>;
}

export const pdfImagesNode: Node<PdfImages> = defineNode<PdfImages>({
  name: "pdf-images",
  resolve: (ctx) =>
    defer(async () => {
      const [{ en }, pairs] = await Promise.all([
        resolveNode(classificationsNode, ctx),
        resolveNode(chapterPairsNode, ctx),
      ]);
      const total = pairs.length + 1;
      let completed = 0;
      reportProgress(ctx, "images", "Generating images", { completed, total });
      const done = () => {
        completed++;
        reportProgress(ctx, "images", "Generating images", { completed, total });
      };

      const cover = async () => {
        let prompt = en.cover_image_prompt.trim();
        if (!prompt) {
          addNotice(ctx, "No cover image prompt; built one from the title");
          prompt = await renderPromptText("cover", { title: en.title });
        }
        const ref = await imageReference(ctx, prompt, "cover.png");
        done();
        return ref;
      };

      const chapterImages = () =>
        mapWithConcurrency(pairs, getChapterConcurrency(ctx.config), async (pair) => {
          const prompt = await chapterImagePrompt(ctx, pair);
          const ref = await imageReference(ctx, prompt, `chapter_${pair.number}.png`);
          done();
          return [pair.number, ref] as const;
        });

      const [coverRef, refs] = await Promise.all([cover(), chapterImages()]);
      return { cover: coverRef, chapters: new Map(refs) };
    }),
});

export function draftFromPair(pair: ChapterPair, coverImageUrl: string): ChapterDraft {
  const { en, pt } = pair;
  return {
    chapter_number: pair.number,
    title_en: en.title,
    title_pt: pt?.title ?? en.title,
    summary_en: en.summary,
    summary_pt: pt?.summary ?? "",
    content_en: renderBlocks(en.blocks),
    content_pt: pt ? renderBlocks(pt.blocks) : "",
    cover_image_url: coverImageUrl,
    translation_gap: pt === null,
  };
}

/** PDF mode: extract, classify both languages, images, pair, render, assemble. */
export const pdfEbookNode: Node<EbookBundle> = defineNode<EbookBundle>({
  name: "pdf-ebook",
  resolve: (ctx) =>
    defer(async () => {
      const [{ en, pt }, pairs, images] = await Promise.all([
        resolveNode(classificationsNode, ctx),
        resolveNode(chapterPairsNode, ctx),
        resolveNode(pdfImagesNode, ctx),
      ]);

      reportProgress(ctx, "assembly", "Rendering chapters");
      const drafts = pairs.map((pair) =>
        draftFromPair(pair, images.chapters.get(pair.number) ?? `images/chapter_${pair.number}.png`)
      );

      return assembleBundle(
        {
          title_en: en.title,
          title_pt: pt.title,
          description_en: en.description,
          description_pt: pt.description,
          cover_image_url: images.cover,
        },
        drafts,
        { pricing: getPricing(ctx.config), notices: ctx.notices }
      );
    }),
});
