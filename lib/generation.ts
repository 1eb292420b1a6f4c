import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { filter, lastValueFrom, map, tap } from "rxjs";
import { getStorageBucket, loadAppConfig, type AppConfig } from "@/lib/config";
import type { JobExecutor } from "@/lib/job-store";
import { extractPdfText } from "@/lib/pdf/extract";
import type { ModelRoster, PdfTextExtractor } from "@/lib/pipeline/core/types";
import type { EbookBundle } from "@/lib/pipeline/assemble/ebook-bundle";
import { createModelRoster, runGeneration } from "@/lib/pipeline/generate";
import { imagesDir } from "@/lib/pipeline/images/generate-image";
import { PipelineError, errorMessage } from "@/lib/pipeline/errors";
import { createContext, type GenerationProgress, type GenerationRequest } from "@/lib/pipeline/node";
import { assembleWriteRecords } from "@/lib/persistence/write-records";
import { adminSupabase, createSupabaseSink, createSupabaseUploader } from "@/lib/persistence/supabase";
import type { EbookSink, ImageUploader } from "@/lib/persistence/types";

export interface GenerationDeps {
  config: AppConfig;
  /** Models for one job; LLM calls are logged under its work directory. */
  createModels: (workDir: string) => ModelRoster;
  extractPdfText: PdfTextExtractor;
  sink: EbookSink;
  uploader?: ImageUploader;
  /** Parent of the per-job work directories (defaults to the OS temp dir). */
  workRoot?: string;
}

/** Job percentage for a pipeline progress event. Persistence takes 90, completion 100. */
export function progressPercent(event: GenerationProgress): number {
  const fraction =
    event.total && event.completed !== undefined ? Math.min(1, event.completed / event.total) : 0;
  switch (event.phase) {
    case "research":
    case "extract":
      return 5;
    case "outline":
    case "classification":
      return 10;
    case "cover":
      return 15;
    case "chapters":
    case "images":
      return 20 + Math.floor(60 * fraction);
    case "assembly":
      return 85;
  }
}

/** Upload images and insert the rows; any failure is reported as the persistence phase. */
async function persist(
  deps: GenerationDeps,
  bundle: EbookBundle,
  workDir: string,
  jobId: string
): Promise<string> {
  try {
    const records = await assembleWriteRecords(bundle, {
      imagesDir: imagesDir(workDir),
      uploader: deps.uploader,
    });
    for (const notice of records.notices) {
      console.warn(`[job ${jobId}] ${notice}`);
    }
    return await deps.sink.insert(records);
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new PipelineError("persistence", errorMessage(err), { cause: err });
  }
}

function executorFor(deps: GenerationDeps, request: GenerationRequest): JobExecutor {
  return async (job, update) => {
    const workDir = fs.mkdtempSync(path.join(deps.workRoot ?? os.tmpdir(), "ebook-"));
    try {
      const ctx = createContext({
        runId: job.id,
        request,
        config: deps.config,
        models: deps.createModels(workDir),
        extractPdfText: deps.extractPdfText,
        outputDir: workDir,
      });

      let percent = 5;
      update({ progress: percent, current_step: "Starting" });

      const bundle = await lastValueFrom(
        runGeneration(ctx).pipe(
          tap((event) => {
            if (event.type !== "progress") return;
            percent = Math.max(percent, progressPercent(event));
            update({ progress: percent, current_step: event.message });
          }),
          filter((event): event is { type: "done"; value: EbookBundle } => event.type === "done"),
          map((event) => event.value)
        )
      );
      for (const notice of bundle.notices) {
        console.warn(`[job ${job.id}] ${notice}`);
      }

      update({ progress: 90, current_step: "Uploading images and saving to database" });
      return await persist(deps, bundle, workDir, job.id);
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  };
}

export function topicExecutor(
  deps: GenerationDeps,
  input: { topic: string; chapterCount: number }
): JobExecutor {
  return executorFor(deps, { mode: "topic", ...input });
}

export function pdfExecutor(
  deps: GenerationDeps,
  input: { pdfEn: Uint8Array; pdfPt: Uint8Array }
): JobExecutor {
  return executorFor(deps, { mode: "pdfs", ...input });
}

/**
 * Production wiring: repo config, configured models and Supabase. The
 * Supabase client is created on first write, so missing credentials fail
 * the job rather than the request.
 */
export function defaultGenerationDeps(root: string = process.cwd()): GenerationDeps {
  const config = loadAppConfig(root);
  const bucket = getStorageBucket(config);
  return {
    config,
    createModels: (workDir) => createModelRoster(config, { outputDir: workDir }),
    extractPdfText: (pdf) => extractPdfText(pdf),
    sink: { insert: (records) => createSupabaseSink(adminSupabase()).insert(records) },
    uploader: {
      upload: (image, folder) => createSupabaseUploader(adminSupabase(), bucket).upload(image, folder),
    },
  };
}

let _deps: GenerationDeps | null = null;

/** Process-wide production deps, created on first use. */
export function generationDeps(): GenerationDeps {
  _deps ??= defaultGenerationDeps();
  return _deps;
}
