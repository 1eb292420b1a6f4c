import { randomUUID } from "node:crypto";
import type { WriteRecords } from "./types";

export function sqlString(value: string | null | undefined): string {
  if (value === null || value === undefined) return "NULL";
  return `'${value.replace(/'/g, "''")}'`;
}

export interface SeedSqlOptions {
  generatedAt?: Date;
  newId?: () => string;
}

/** INSERT statements for an ebook and its chapters, with fresh ids. */
export function buildSeedSql(records: WriteRecords, options: SeedSqlOptions = {}): string {
  const newId = options.newId ?? randomUUID;
  const generatedAt = options.generatedAt ?? new Date();
  const { ebook } = records;
  const ebookId = newId();

  const lines = [
    "-- Ebook seed file",
    `-- Generated: ${generatedAt.toISOString()}`,
    `-- Title: ${ebook.title_en.replace(/\s+/g, " ")}`,
    "",
    "INSERT INTO ebooks (",
    "  id, title_en, title_pt, slug, description_en, description_pt,",
    "  cover_image_url, price_usd, price_brl, estimated_read_time_minutes, status",
    ") VALUES (",
    `  ${sqlString(ebookId)},`,
    `  ${sqlString(ebook.title_en)},`,
    `  ${sqlString(ebook.title_pt)},`,
    `  ${sqlString(ebook.slug)},`,
    `  ${sqlString(ebook.description_en)},`,
    `  ${sqlString(ebook.description_pt)},`,
    `  ${sqlString(ebook.cover_image_url)},`,
    `  ${ebook.price_usd},`,
    `  ${ebook.price_brl},`,
    `  ${ebook.estimated_read_time_minutes},`,
    `  ${sqlString(ebook.status)}`,
    ");",
    "",
  ];

  for (const ch of records.chapters) {
    lines.push(
      "INSERT INTO chapters (",
      "  id, ebook_id, chapter_number, title_en, title_pt, slug,",
      "  cover_image_url, content_en, content_pt, summary_en, summary_pt,",
      "  estimated_read_time_minutes, is_free_preview, is_published",
      ") VALUES (",
      `  ${sqlString(newId())},`,
      `  ${sqlString(ebookId)},`,
      `  ${ch.chapter_number},`,
      `  ${sqlString(ch.title_en)},`,
      `  ${sqlString(ch.title_pt)},`,
      `  ${sqlString(ch.slug)},`,
      `  ${sqlString(ch.cover_image_url)},`,
      `  ${sqlString(ch.content_en)},`,
      `  ${sqlString(ch.content_pt)},`,
      `  ${sqlString(ch.summary_en)},`,
      `  ${sqlString(ch.summary_pt)},`,
      `  ${ch.estimated_read_time_minutes},`,
      `  ${ch.is_free_preview},`,
      `  ${ch.is_published}`,
      ");",
      ""
    );
  }

  return lines.join("\n");
}
