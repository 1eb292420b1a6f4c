#!/usr/bin/env node
/**
 * Ebook generation CLI
 *
 * Usage:
 *   npm run generate -- "<topic>" --chapters 5
 *   npm run generate -- --pdf-en book_en.pdf --pdf-pt book_pt.pdf
 */

import fs from "node:fs";
import path from "node:path";
import { getDefaultChapterCount, getStorageBucket, loadAppConfig } from "../config";
import { loadDotenv } from "../env";
import { extractPdfText } from "../pdf/extract";
import { createModelRoster, runGeneration } from "../pipeline/generate";
import { imagesDir } from "../pipeline/images/generate-image";
import { createContext, type GenerationRequest } from "../pipeline/node";
import { assembleWriteRecords } from "../persistence/write-records";
import { buildSeedSql } from "../persistence/sql-seed";
import { adminSupabase, createSupabaseSink, createSupabaseUploader } from "../persistence/supabase";
import { USAGE, UsageError, defaultOutputDir, formatSummary, parseGenerateArgs, type GenerateArgs } from "./args";
import { runWithProgress } from "./progress";

function readPdf(file: string, language: string): Uint8Array {
  if (!fs.existsSync(file)) {
    throw new UsageError(`${language} PDF not found: ${file}`);
  }
  return fs.readFileSync(file);
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  let args: GenerateArgs;
  try {
    args = parseGenerateArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n`);
      console.log(USAGE);
      process.exit(1);
    }
    throw err;
  }

  loadDotenv();
  const root = process.cwd();
  const config = loadAppConfig(root);

  let request: GenerationRequest;
  let nameHint: string;
  let intro: string;
  if (args.mode === "pdfs") {
    request = {
      mode: "pdfs",
      pdfEn: readPdf(args.pdfEn, "English"),
      pdfPt: readPdf(args.pdfPt, "Portuguese"),
    };
    nameHint = path.parse(args.pdfEn).name;
    intro = `Importing ebook from PDFs:\n  English: ${args.pdfEn}\n  Portuguese: ${args.pdfPt}`;
  } else {
    request = { mode: "topic", topic: args.topic, chapterCount: args.chapters ?? getDefaultChapterCount(config) };
    nameHint = args.topic;
    intro = `Generating ebook for: "${args.topic}" (${request.chapterCount} chapters)`;
  }

  const outputDir = path.resolve(args.output ?? defaultOutputDir(nameHint));
  fs.mkdirSync(outputDir, { recursive: true });
  console.log(`\nOutput directory: ${outputDir}`);
  console.log(`${intro}\n`);

  const ctx = createContext({
    request,
    config,
    models: createModelRoster(config, {
      cacheDir: args.skipCache ? undefined : path.join(root, ".cache", "llm"),
      outputDir,
    }),
    extractPdfText: (pdf) => extractPdfText(pdf),
    outputDir,
  });

  const bundle = await runWithProgress(runGeneration(ctx));

  const bundleFile = path.join(outputDir, "ebook.json");
  fs.writeFileSync(bundleFile, JSON.stringify(bundle, null, 2) + "\n");

  const uploader = args.persist ? createSupabaseUploader(adminSupabase(), getStorageBucket(config)) : undefined;
  const records = await assembleWriteRecords(bundle, { imagesDir: imagesDir(outputDir), uploader });
  const seedFile = path.join(outputDir, "seed.sql");
  fs.writeFileSync(seedFile, buildSeedSql(records));

  console.log(formatSummary(bundle, { bundleFile, seedFile }));

  if (args.persist) {
    for (const notice of records.notices) console.warn(`[generate] ${notice}`);
    const ebookId = await createSupabaseSink(adminSupabase()).insert(records);
    console.log(`\nSaved to Supabase: ebook ${ebookId}`);
  } else {
    console.log(`\nTo apply to a database:\n  psql -f ${seedFile}\n  (or run it in the Supabase SQL editor)`);
  }
}

main().catch((err) => {
  console.error("\nGeneration failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
