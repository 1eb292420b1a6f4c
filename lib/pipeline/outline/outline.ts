import { defer } from "rxjs";
import { getTemperatures, getTimeouts } from "@/lib/config";
import { extractJsonObject } from "../core/json";
import { ok, recovered, type Outcome } from "../core/outcome";
import { loadPrompt } from "../prompt";
import { PipelineError, errorMessage } from "../errors";
import { addNotice, defineNode, reportProgress, resolveNode, topicRequest, type Node } from "../node";
import { researchNode } from "../research/research";
import { outlineSchema, type Outline, type OutlineChapter } from "./outline-schema";

function templatedChapter(number: number): OutlineChapter {
  return {
    number,
    title_en: `Chapter ${number}`,
    title_pt: `Capítulo ${number}`,
    summary_en: "Summary",
    summary_pt: "Resumo",
    key_points: [],
  };
}

/** Templated outline used when the model's outline cannot be read. */
export function fallbackOutline(topic: string, chapterCount: number): Outline {
  const subject = topic.trim();
  return {
    title_en: subject,
    title_pt: subject,
    description_en: `A practical guide to ${subject}.`,
    description_pt: `Um guia prático sobre ${subject}.`,
    chapters: Array.from({ length: chapterCount }, (_, i) => templatedChapter(i + 1)),
  };
}

/**
 * Read the outline from a model response. Never throws: an unreadable or
 * inconsistent outline is replaced by the templated fallback.
 *
 * Chapters come back sorted by number, exactly `chapterCount` of them:
 * numbers 1..chapterCount the model left out get templated chapters.
 */
export function parseOutline(response: string, topic: string, chapterCount: number): Outcome<Outline> {
  const fallback = (reason: string) => recovered(fallbackOutline(topic, chapterCount), reason);

  const json = extractJsonObject(response);
  if (json.kind === "fatal") return fallback(`outline: ${json.reason}`);

  const parsed = outlineSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}` : "schema mismatch";
    return fallback(`outline does not match the expected shape (${where})`);
  }

  const numbers = parsed.data.chapters.map((c) => c.number);
  if (new Set(numbers).size !== numbers.length) {
    return fallback("outline has duplicate chapter numbers");
  }

  const present = new Set(numbers);
  const missing = Array.from({ length: chapterCount }, (_, i) => i + 1).filter((n) => !present.has(n));
  const chapters = [...parsed.data.chapters, ...missing.map(templatedChapter)]
    .sort((a, b) => a.number - b.number)
    .slice(0, chapterCount);
  const outline = { ...parsed.data, chapters };

  if (missing.length > 0) {
    return recovered(outline, `outline is missing chapters ${missing.join(", ")}; used templated chapters`);
  }
  return ok(outline);
}

export const outlineNode: Node<Outline> = defineNode<Outline>({
  name: "outline",
  resolve: (ctx) =>
    defer(async () => {
      const { topic, chapterCount } = topicRequest(ctx);
      // Outline runs after research
      await resolveNode(researchNode, ctx);
      reportProgress(ctx, "outline", "Creating outline");

      let response: string;
      try {
        const prompt = await loadPrompt("outline", { topic, chapter_count: chapterCount });
        response = await ctx.models.writer.generateText({
          ...prompt,
          temperature: getTemperatures(ctx.config).outline,
          timeoutMs: getTimeouts(ctx.config).textMs,
          log: { taskType: "outline", promptName: "outline" },
        });
      } catch (err) {
        throw new PipelineError("outline", errorMessage(err), { cause: err });
      }

      const outcome = parseOutline(response, topic, chapterCount);
      switch (outcome.kind) {
        case "ok":
          return outcome.value;
        case "recovered":
          console.warn(`[${ctx.runId}] ${outcome.reason}`);
          addNotice(ctx, outcome.reason);
          return outcome.value;
        case "fatal":
          throw new PipelineError("outline", outcome.reason);
      }
    }),
});
