import { z } from "zod/v4";
import type { Job } from "@/lib/job-store";

export const MAX_PDF_BYTES = 50 * 1024 * 1024;

export type Validated<T> = { ok: true; value: T } | { ok: false; error: string };

function formString(form: FormData, key: string): string | undefined {
  const value = form.get(key);
  return typeof value === "string" && value !== "" ? value : undefined;
}

const CHAPTERS_ERROR = "num_chapters must be an integer between 1 and 20";

const topicFormSchema = z.object({
  topic: z
    .string({ error: "topic is required" })
    .min(10, "Topic must be at least 10 characters")
    .max(1000, "Topic must be less than 1000 characters"),
  num_chapters: z.coerce
    .number({ error: CHAPTERS_ERROR })
    .int(CHAPTERS_ERROR)
    .min(1, CHAPTERS_ERROR)
    .max(20, CHAPTERS_ERROR)
    .default(5),
});

export function validateTopicForm(form: FormData): Validated<{ topic: string; chapterCount: number }> {
  const parsed = topicFormSchema.safeParse({
    topic: formString(form, "topic"),
    num_chapters: formString(form, "num_chapters"),
  });
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? "Invalid request" };
  }
  return { ok: true, value: { topic: parsed.data.topic, chapterCount: parsed.data.num_chapters } };
}

function checkPdf(value: FormDataEntryValue | null, language: string): string | null {
  if (!(value instanceof File) || !value.name.toLowerCase().endsWith(".pdf")) {
    return `${language} file must be a PDF`;
  }
  if (value.size > MAX_PDF_BYTES) {
    return `${language} PDF exceeds 50MB limit`;
  }
  return null;
}

export async function validatePdfForm(
  form: FormData
): Promise<Validated<{ pdfEn: Uint8Array; pdfPt: Uint8Array }>> {
  const en = form.get("pdf_en");
  const pt = form.get("pdf_pt");
  const error = checkPdf(en, "English") ?? checkPdf(pt, "Portuguese");
  if (error || !(en instanceof File) || !(pt instanceof File)) {
    return { ok: false, error: error ?? "Both pdf_en and pdf_pt are required" };
  }
  const [pdfEn, pdfPt] = await Promise.all([en.arrayBuffer(), pt.arrayBuffer()]);
  return { ok: true, value: { pdfEn: new Uint8Array(pdfEn), pdfPt: new Uint8Array(pdfPt) } };
}

export const STARTED_MESSAGE = "Ebook generation started. Poll /api/v1/jobs/{job_id} for status.";

export interface JobResponse {
  job_id: string;
  status: Job["status"];
  progress: number;
  current_step: string | null;
  ebook_id: string | null;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export function jobResponse(job: Job): JobResponse {
  return {
    job_id: job.id,
    status: job.status,
    progress: job.progress,
    current_step: job.current_step,
    ebook_id: job.result_id,
    error: job.error,
    created_at: job.created_at,
    updated_at: job.updated_at,
  };
}
