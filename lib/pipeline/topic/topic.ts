import { defer } from "rxjs";
import { getChapterConcurrency, getPricing } from "@/lib/config";
import { mapWithConcurrency } from "../concurrency";
import { renderPromptText } from "../prompt";
import { defineNode, reportProgress, resolveNode, topicRequest, type Node } from "../node";
import { researchNode } from "../research/research";
import { outlineNode } from "../outline/outline";
import { nextArchiveCitation } from "../chapters/archive-citation";
import { writeChapter } from "../chapters/write-chapter";
import { imageReference } from "../images/generate-image";
import { assembleBundle, type ChapterDraft, type EbookBundle } from "../assemble/ebook-bundle";

export const coverNode: Node<string> = defineNode<string>({
  name: "cover",
  resolve: (ctx) =>
    defer(async () => {
      const outline = await resolveNode(outlineNode, ctx);
      reportProgress(ctx, "cover", "Generating cover image");
      const prompt = await renderPromptText("cover", { title: outline.title_en });
      return imageReference(ctx, prompt, "cover.png");
    }),
});

export const topicChaptersNode: Node<ChapterDraft[]> = defineNode<ChapterDraft[]>({
  name: "topic-chapters",
  resolve: (ctx) =>
    defer(async () => {
      const { topic } = topicRequest(ctx);
      const research = await resolveNode(researchNode, ctx);
      const outline = await resolveNode(outlineNode, ctx);

      const total = outline.chapters.length;
      let completed = 0;
      reportProgress(ctx, "chapters", `Writing ${total} chapters`, { completed, total });

      // Citations follow chapter order, whatever order the writers finish in
      const items = outline.chapters.map((chapter) => ({ chapter, citation: nextArchiveCitation(ctx) }));

      return mapWithConcurrency(items, getChapterConcurrency(ctx.config), async ({ chapter, citation }) => {
        const draft = await writeChapter(ctx, { topic, research, chapter, citation });
        completed++;
        reportProgress(ctx, "chapters", `Chapter ${chapter.number} written`, { completed, total });
        return draft;
      });
    }),
});

/** Topic mode: research, outline, then cover and chapters concurrently. */
export const topicEbookNode: Node<EbookBundle> = defineNode<EbookBundle>({
  name: "topic-ebook",
  resolve: (ctx) =>
    defer(async () => {
      const outline = await resolveNode(outlineNode, ctx);
      const [cover, chapters] = await Promise.all([
        resolveNode(coverNode, ctx),
        resolveNode(topicChaptersNode, ctx),
      ]);

      reportProgress(ctx, "assembly", "Assembling ebook");
      return assembleBundle(
        {
          title_en: outline.title_en,
          title_pt: outline.title_pt,
          description_en: outline.description_en,
          description_pt: outline.description_pt,
          cover_image_url: cover,
        },
        chapters,
        { pricing: getPricing(ctx.config), notices: ctx.notices }
      );
    }),
});
