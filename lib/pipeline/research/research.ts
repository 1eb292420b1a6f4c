import { defer } from "rxjs";
import { getTemperatures, getTimeouts } from "@/lib/config";
import { loadPrompt } from "../prompt";
import { PipelineError, errorMessage } from "../errors";
import { defineNode, reportProgress, topicRequest, type Node } from "../node";

/**
 * Free-form research notes on the topic, shared by every chapter.
 * There is no ebook without them, so any failure ends the run.
 */
export const researchNode: Node<string> = defineNode<string>({
  name: "research",
  resolve: (ctx) =>
    defer(async () => {
      const { topic } = topicRequest(ctx);
      reportProgress(ctx, "research", "Researching topic");

      let notes: string;
      try {
        const prompt = await loadPrompt("research", { topic });
        notes = await ctx.models.research.generateText({
          ...prompt,
          temperature: getTemperatures(ctx.config).research,
          timeoutMs: getTimeouts(ctx.config).textMs,
          log: { taskType: "research", promptName: "research" },
        });
      } catch (err) {
        throw new PipelineError("research", errorMessage(err), { cause: err });
      }

      if (!notes.trim()) {
        throw new PipelineError("research", "research model returned an empty response");
      }
      return notes.trim();
    }),
});
