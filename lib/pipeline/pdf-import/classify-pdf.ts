import { defer } from "rxjs";
import { getMaxTokens, getTemperatures, getTimeouts } from "@/lib/config";
import { extractJsonObject } from "../core/json";
import { fatal, ok, type Outcome } from "../core/outcome";
import { loadPrompt } from "../prompt";
import { ClassificationParseError, PipelineError, errorMessage } from "../errors";
import { defineNode, pdfRequest, reportProgress, resolveNode, type Node, type PipelineContext } from "../node";
import { classificationSchema, type Classification } from "./classification-schema";

export type SourceLanguage = "en" | "pt";

export const LANGUAGE_NAMES: Record<SourceLanguage, string> = {
  en: "English",
  pt: "Brazilian Portuguese",
};

/**
 * Read a classification response. Unlike the outline there is no safe
 * stand-in for arbitrary source content, so failure is fatal.
 */
export function parseClassification(response: string): Outcome<Classification> {
  const json = extractJsonObject(response);
  if (json.kind === "fatal") return fatal(json.reason);

  const parsed = classificationSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fatal(
      issue ? `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}` : "schema mismatch"
    );
  }
  return ok(parsed.data);
}

export async function classifyPdfText(
  ctx: PipelineContext,
  language: SourceLanguage,
  pdfText: string
): Promise<Classification> {
  let response: string;
  try {
    const prompt = await loadPrompt("classify_pdf", {
      language: LANGUAGE_NAMES[language],
      pdf_text: pdfText,
    });
    response = await ctx.models.writer.generateText({
      ...prompt,
      temperature: getTemperatures(ctx.config).classification,
      maxTokens: getMaxTokens(ctx.config).classification,
      timeoutMs: getTimeouts(ctx.config).largeContextMs,
      log: { taskType: `classify-${language}`, promptName: "classify_pdf" },
    });
  } catch (err) {
    throw new PipelineError("classification", errorMessage(err), { step: language, cause: err });
  }

  const outcome = parseClassification(response);
  if (outcome.kind === "fatal") {
    throw new ClassificationParseError(LANGUAGE_NAMES[language], outcome.reason);
  }
  return outcome.value;
}

export interface SourceTexts {
  en: string;
  pt: string;
}

export const sourceTextsNode: Node<SourceTexts> = defineNode<SourceTexts>({
  name: "pdf-text",
  resolve: (ctx) =>
    defer(async () => {
      const { pdfEn, pdfPt } = pdfRequest(ctx);
      reportProgress(ctx, "extract", "Extracting PDF text");

      const extract = async (language: SourceLanguage, pdf: Uint8Array) => {
        let text: string;
        try {
          text = await ctx.extractPdfText(pdf);
        } catch (err) {
          throw new PipelineError("extract", errorMessage(err), { step: language, cause: err });
        }
        if (!text.trim()) {
          throw new PipelineError("extract", `no text found in the ${LANGUAGE_NAMES[language]} PDF`);
        }
        return text;
      };

      const [en, pt] = await Promise.all([extract("en", pdfEn), extract("pt", pdfPt)]);
      return { en, pt };
    }),
});

export interface Classifications {
  en: Classification;
  pt: Classification;
}

export const classificationsNode: Node<Classifications> = defineNode<Classifications>({
  name: "pdf-classification",
  resolve: (ctx) =>
    defer(async () => {
      const texts = await resolveNode(sourceTextsNode, ctx);
      reportProgress(ctx, "classification", "Classifying content");
      const [en, pt] = await Promise.all([
        classifyPdfText(ctx, "en", texts.en),
        classifyPdfText(ctx, "pt", texts.pt),
      ]);
      return { en, pt };
    }),
});
