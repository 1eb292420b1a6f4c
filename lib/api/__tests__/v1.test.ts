import { describe, it, expect } from "vitest";
import { MAX_PDF_BYTES, jobResponse, validatePdfForm, validateTopicForm } from "../v1";
import type { Job } from "../../job-store";

function form(entries: Record<string, string | File>): FormData {
  const data = new FormData();
  for (const [key, value] of Object.entries(entries)) data.append(key, value);
  return data;
}

function pdf(name: string, content: BlobPart = new Uint8Array([37, 80, 68, 70])): File {
  return new File([content], name, { type: "application/pdf" });
}

describe("validateTopicForm", () => {
  it("defaults to five chapters", () => {
    expect(validateTopicForm(form({ topic: "Strength training after forty" }))).toEqual({
      ok: true,
      value: { topic: "Strength training after forty", chapterCount: 5 },
    });
  });

  it("coerces the chapter count", () => {
    const result = validateTopicForm(form({ topic: "Strength training after forty", num_chapters: "12" }));
    expect(result).toEqual({ ok: true, value: { topic: "Strength training after forty", chapterCount: 12 } });
  });

  it.each<[Record<string, string>, string]>([
    [{}, "topic is required"],
    [{ topic: "short" }, "Topic must be at least 10 characters"],
    [{ topic: "x".repeat(1001) }, "Topic must be less than 1000 characters"],
    [{ topic: "A long enough topic", num_chapters: "0" }, "num_chapters must be an integer between 1 and 20"],
    [{ topic: "A long enough topic", num_chapters: "21" }, "num_chapters must be an integer between 1 and 20"],
    [{ topic: "A long enough topic", num_chapters: "2.5" }, "num_chapters must be an integer between 1 and 20"],
    [{ topic: "A long enough topic", num_chapters: "many" }, "num_chapters must be an integer between 1 and 20"],
  ])("rejects %j", (entries, error) => {
    expect(validateTopicForm(form(entries))).toEqual({ ok: false, error });
  });
});

describe("validatePdfForm", () => {
  it("reads both files", async () => {
    const result = await validatePdfForm(form({ pdf_en: pdf("book-en.PDF"), pdf_pt: pdf("book-pt.pdf") }));
    expect(result.ok).toBe(true);
    if (result.ok) expect([...result.value.pdfEn]).toEqual([37, 80, 68, 70]);
  });

  it("requires PDF files", async () => {
    expect(await validatePdfForm(form({ pdf_en: pdf("book.docx"), pdf_pt: pdf("pt.pdf") }))).toEqual({
      ok: false,
      error: "English file must be a PDF",
    });
    expect(await validatePdfForm(form({ pdf_en: pdf("en.pdf") }))).toEqual({
      ok: false,
      error: "Portuguese file must be a PDF",
    });
  });

  it("enforces the size limit", async () => {
    const big = pdf("pt.pdf", new Uint8Array(MAX_PDF_BYTES + 1));
    expect(await validatePdfForm(form({ pdf_en: pdf("en.pdf"), pdf_pt: big }))).toEqual({
      ok: false,
      error: "Portuguese PDF exceeds 50MB limit",
    });
  });
});

describe("jobResponse", () => {
  it("exposes the ebook id", () => {
    const job: Job = {
      id: "job-1",
      status: "completed",
      progress: 100,
      current_step: "Done",
      result_id: "ebook-9",
      error: null,
      created_at: "2026-01-01T00:00:00.000Z",
      updated_at: "2026-01-01T00:01:00.000Z",
    };
    expect(jobResponse(job)).toEqual({
      job_id: "job-1",
      status: "completed",
      progress: 100,
      current_step: "Done",
      ebook_id: "ebook-9",
      error: null,
      created_at: "2026-01-01T00:00:00.000Z",
      updated_at: "2026-01-01T00:01:00.000Z",
    });
  });
});
