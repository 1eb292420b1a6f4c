import fs from "node:fs";
import initSqlJs from "sql.js";
import { describe, it, expect } from "vitest";
import { buildSeedSql, sqlString } from "../sql-seed";
import { sampleRecords } from "./fixtures";

const SCHEMA = fs.readFileSync(new URL("../../../sql/schema.sql", import.meta.url), "utf8");

function sequentialIds() {
  let n = 0;
  return () => `id-${++n}`;
}

describe("sqlString", () => {
  it("doubles single quotes", () => {
    expect(sqlString("Men's Protocol")).toBe("'Men''s Protocol'");
  });

  it("writes NULL for missing values", () => {
    expect(sqlString(null)).toBe("NULL");
    expect(sqlString(undefined)).toBe("NULL");
  });
});

describe("buildSeedSql", () => {
  const sql = buildSeedSql(sampleRecords(), {
    generatedAt: new Date("2026-01-02T03:04:05.000Z"),
    newId: sequentialIds(),
  });

  it("starts with a header naming the book", () => {
    expect(sql.split("\n").slice(0, 3)).toEqual([
      "-- Ebook seed file",
      "-- Generated: 2026-01-02T03:04:05.000Z",
      "-- Title: Men's Protocol",
    ]);
  });

  it("quotes text values", () => {
    expect(sql).toContain("  'Men''s Protocol',\n");
    expect(sql).toContain("  '<p>It''s day 1</p>',\n");
  });

  it("loads into the schema", async () => {
    const SQL = await initSqlJs();
    const db = new SQL.Database();
    db.exec(SCHEMA);
    db.exec(sql);

    const [ebooks] = db.exec("SELECT id, title_en, description_pt, estimated_read_time_minutes FROM ebooks");
    expect(ebooks.values).toEqual([["id-1", "Men's Protocol", null, 7]]);

    const [chapters] = db.exec(
      "SELECT id, ebook_id, chapter_number, content_en, is_free_preview FROM chapters ORDER BY chapter_number"
    );
    expect(chapters.values).toEqual([
      ["id-2", "id-1", 1, "<p>It's day 1</p>", 1],
      ["id-3", "id-1", 2, "<p>It's day 2</p>", 0],
    ]);
    db.close();
  });
});
