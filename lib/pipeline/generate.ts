import path from "node:path";
import { lastValueFrom, filter, map, type Observable } from "rxjs";
import { getMaxRetries, getModelSpecs, getTimeouts, type AppConfig } from "@/lib/config";
import { createImageModel, createTextModel } from "./core/llm";
import type { ModelRoster } from "./core/types";
import { appendLogEntry, llmLogPath, type LlmLogEntry } from "./llm-log";
import { runNode, type GenerationEvent, type Node, type PipelineContext } from "./node";
import type { EbookBundle } from "./assemble/ebook-bundle";
import { topicEbookNode } from "./topic/topic";
import { pdfEbookNode } from "./pdf-import/pdf-import";

export interface ModelRosterOptions {
  /** Text responses are cached under this directory when set. */
  cacheDir?: string;
  /** Run output directory; LLM calls are logged to its llm-log.jsonl. */
  outputDir?: string;
}

export function createModelRoster(config: AppConfig, options: ModelRosterOptions = {}): ModelRoster {
  const specs = getModelSpecs(config);
  const timeouts = getTimeouts(config);
  const maxRetries = getMaxRetries(config);
  const logFile = options.outputDir ? llmLogPath(options.outputDir) : null;
  const onLog = logFile ? (entry: LlmLogEntry) => appendLogEntry(logFile, entry) : undefined;

  return {
    research: createTextModel({
      spec: specs.research,
      cacheDir: options.cacheDir && path.join(options.cacheDir, "research"),
      maxRetries,
      defaultTimeoutMs: timeouts.textMs,
      onLog,
    }),
    writer: createTextModel({
      spec: specs.writer,
      cacheDir: options.cacheDir && path.join(options.cacheDir, "writer"),
      maxRetries,
      defaultTimeoutMs: timeouts.textMs,
      onLog,
    }),
    image: createImageModel({
      spec: specs.image,
      maxRetries,
      defaultTimeoutMs: timeouts.imageMs,
    }),
  };
}

/** The bundle node for the context's request mode. */
export function ebookNodeFor(ctx: PipelineContext): Node<EbookBundle> {
  return ctx.request.mode === "topic" ? topicEbookNode : pdfEbookNode;
}

export function runGeneration(ctx: PipelineContext): Observable<GenerationEvent<EbookBundle>> {
  return runNode(ctx, ebookNodeFor(ctx));
}

async function bundleOf(ctx: PipelineContext): Promise<EbookBundle> {
  return lastValueFrom(
    runGeneration(ctx).pipe(
      filter((e): e is { type: "done"; value: EbookBundle } => e.type === "done"),
      map((e) => e.value)
    )
  );
}

export function generateFromTopic(ctx: PipelineContext): Promise<EbookBundle> {
  if (ctx.request.mode !== "topic") {
    return Promise.reject(new Error(`Run ${ctx.runId} is not a topic generation`));
  }
  return bundleOf(ctx);
}

export function generateFromPdfs(ctx: PipelineContext): Promise<EbookBundle> {
  if (ctx.request.mode !== "pdfs") {
    return Promise.reject(new Error(`Run ${ctx.runId} is not a PDF import`));
  }
  return bundleOf(ctx);
}
