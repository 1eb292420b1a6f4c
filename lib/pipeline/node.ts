import { randomUUID } from "node:crypto";
import { Observable, Subject, last, shareReplay } from "rxjs";
import type { AppConfig } from "../config";
import type { ModelRoster, PdfTextExtractor } from "./core/types";

export type GenerationRequest =
  | { mode: "topic"; topic: string; chapterCount: number }
  | { mode: "pdfs"; pdfEn: Uint8Array; pdfPt: Uint8Array };

export type ProgressPhase =
  | "research"
  | "outline"
  | "cover"
  | "chapters"
  | "extract"
  | "classification"
  | "images"
  | "assembly";

export interface GenerationProgress {
  type: "progress";
  phase: ProgressPhase;
  message: string;
  completed?: number;
  total?: number;
}

export type GenerationEvent<T> = GenerationProgress | { type: "done"; value: T };

export interface PipelineContext {
  runId: string;
  request: GenerationRequest;
  config: AppConfig;
  models: ModelRoster;
  extractPdfText: PdfTextExtractor;
  /** Generated images are written under `<outputDir>/images`. */
  outputDir: string;
  progress: Subject<GenerationProgress>;
  /** Recoverable fallbacks applied during the run. */
  notices: string[];
  /** Archive citations issued so far in this run. */
  archiveCitations: number;
  cache: Map<unknown, Observable<unknown>>;
}

export interface Node<T> {
  readonly name: string;
  resolve(ctx: PipelineContext): Observable<T>;
}

/**
 * A pipeline step whose result is computed once per context and replayed
 * to every dependent.
 */
export function defineNode<T>(config: {
  name: string;
  resolve: (ctx: PipelineContext) => Observable<T>;
}): Node<T> {
  const node: Node<T> = {
    name: config.name,
    resolve(ctx: PipelineContext): Observable<T> {
      const cached = ctx.cache.get(node);
      if (cached) return cached as Observable<T>;

      const obs = config.resolve(ctx).pipe(shareReplay({ bufferSize: 1, refCount: false }));
      ctx.cache.set(node, obs);
      return obs;
    },
  };
  return node;
}

export function createContext(options: {
  runId?: string;
  request: GenerationRequest;
  config: AppConfig;
  models: ModelRoster;
  extractPdfText: PdfTextExtractor;
  outputDir: string;
}): PipelineContext {
  return {
    runId: options.runId ?? randomUUID(),
    request: options.request,
    config: options.config,
    models: options.models,
    extractPdfText: options.extractPdfText,
    outputDir: options.outputDir,
    progress: new Subject<GenerationProgress>(),
    notices: [],
    archiveCitations: 0,
    cache: new Map(),
  };
}

export function reportProgress(
  ctx: PipelineContext,
  phase: ProgressPhase,
  message: string,
  counts?: { completed: number; total: number }
): void {
  ctx.progress.next({ type: "progress", phase, message, ...counts });
}

export function addNotice(ctx: PipelineContext, notice: string): void {
  ctx.notices.push(notice);
}

export function resolveNode<T>(node: Node<T>, ctx: PipelineContext): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let result: { value: T } | null = null;
    node.resolve(ctx).subscribe({
      next(v) {
        result = { value: v };
      },
      error: reject,
      complete() {
        if (result) resolve(result.value);
        else reject(new Error(`Node "${node.name}" completed without emitting a value`));
      },
    });
  });
}

/**
 * Run a node to completion, streaming the context's progress events and
 * ending with `{ type: "done", value }`.
 */
export function runNode<T>(ctx: PipelineContext, node: Node<T>): Observable<GenerationEvent<T>> {
  return new Observable<GenerationEvent<T>>((subscriber) => {
    const progressSub = ctx.progress.subscribe((p) => subscriber.next(p));
    const sub = node
      .resolve(ctx)
      .pipe(last())
      .subscribe({
        next: (value) => subscriber.next({ type: "done", value }),
        error: (err) => subscriber.error(err),
        complete: () => subscriber.complete(),
      });
    return () => {
      progressSub.unsubscribe();
      sub.unsubscribe();
    };
  });
}

export type TopicRequest = Extract<GenerationRequest, { mode: "topic" }>;
export type PdfRequest = Extract<GenerationRequest, { mode: "pdfs" }>;

export function topicRequest(ctx: PipelineContext): TopicRequest {
  if (ctx.request.mode !== "topic") {
    throw new Error(`Run ${ctx.runId} is not a topic generation`);
  }
  return ctx.request;
}

export function pdfRequest(ctx: PipelineContext): PdfRequest {
  if (ctx.request.mode !== "pdfs") {
    throw new Error(`Run ${ctx.runId} is not a PDF import`);
  }
  return ctx.request;
}
