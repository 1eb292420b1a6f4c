import path from "node:path";
import { slugify } from "../pipeline/slug";
import { totalReadTime, type EbookBundle } from "../pipeline/assemble/ebook-bundle";

export const MAX_CHAPTERS = 20;

export const USAGE = `Usage: npm run generate -- [options] "<topic>"
       npm run generate -- [options] --pdf-en <file> --pdf-pt <file>

Topic mode researches, outlines and writes a new ebook.
PDF mode imports an existing ebook from its English and Portuguese PDFs.

Options:
  --chapters <n>      Chapters to write in topic mode (1-${MAX_CHAPTERS}, default from config.yaml)
  --pdf-en <file>     English source PDF
  --pdf-pt <file>     Portuguese source PDF
  --output <dir>      Output directory (default: output/<date>_<slug>)
  --persist           Upload images and insert the ebook into Supabase
  --skip-cache        Skip LLM cache`;

export type GenerateArgs =
  | { mode: "topic"; topic: string; chapters?: number; output?: string; persist: boolean; skipCache: boolean }
  | { mode: "pdfs"; pdfEn: string; pdfPt: string; output?: string; persist: boolean; skipCache: boolean };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseGenerateArgs(args: string[]): GenerateArgs {
  const positional: string[] = [];
  let chapters: number | undefined;
  let pdfEn: string | undefined;
  let pdfPt: string | undefined;
  let output: string | undefined;
  let persist = false;
  let skipCache = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--chapters" && args[i + 1]) {
      chapters = parseInt(args[++i], 10);
      if (!Number.isInteger(chapters) || chapters < 1 || chapters > MAX_CHAPTERS) {
        throw new UsageError(`--chapters must be between 1 and ${MAX_CHAPTERS}`);
      }
    } else if (arg === "--pdf-en" && args[i + 1]) {
      pdfEn = args[++i];
    } else if (arg === "--pdf-pt" && args[i + 1]) {
      pdfPt = args[++i];
    } else if (arg === "--output" && args[i + 1]) {
      output = args[++i];
    } else if (arg === "--persist") {
      persist = true;
    } else if (arg === "--skip-cache") {
      skipCache = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (pdfEn || pdfPt) {
    if (!pdfEn || !pdfPt) {
      throw new UsageError("PDF mode requires both --pdf-en and --pdf-pt");
    }
    return { mode: "pdfs", pdfEn, pdfPt, output, persist, skipCache };
  }

  const topic = positional.join(" ").trim();
  if (!topic) {
    throw new UsageError("A topic or --pdf-en/--pdf-pt is required");
  }
  return { mode: "topic", topic, chapters, output, persist, skipCache };
}

/** `output/<yyyy-mm-dd>_<slug>`, the slug capped at 50 characters. */
export function defaultOutputDir(nameHint: string, now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10);
  const slug = slugify(nameHint, 50);
  return path.join("output", slug ? `${date}_${slug}` : date);
}

function formatCents(cents: number): string {
  return (cents / 100).toFixed(2);
}

export function formatSummary(bundle: EbookBundle, files: { bundleFile: string; seedFile: string }): string {
  const { ebook, chapters } = bundle;
  const rule = "=".repeat(60);
  const lines = [
    "",
    rule,
    "EBOOK GENERATED",
    rule,
    "",
    `Title (EN): ${ebook.title_en}`,
    `Title (PT): ${ebook.title_pt}`,
    `Slug: ${ebook.slug}`,
    `Chapters: ${chapters.length}`,
    `Total Read Time: ~${totalReadTime(chapters)} min`,
    `Status: ${ebook.status}`,
    "",
    `Price USD: $${formatCents(ebook.price_usd)}`,
    `Price BRL: R$${formatCents(ebook.price_brl)}`,
    "",
    "Chapters:",
  ];
  for (const ch of chapters) {
    const marks = [ch.is_free_preview ? " [FREE PREVIEW]" : "", ch.translation_gap ? " [NO PT SOURCE]" : ""].join("");
    lines.push(`  ${ch.chapter_number}. ${ch.title_en}${marks}`);
    lines.push(`     ~${ch.estimated_read_time_minutes} min read`);
  }
  if (bundle.notices.length > 0) {
    lines.push("", "Notices:");
    for (const notice of bundle.notices) lines.push(`  - ${notice}`);
  }
  lines.push("", `Bundle: ${files.bundleFile}`, `Seed file: ${files.seedFile}`, rule);
  return lines.join("\n");
}
