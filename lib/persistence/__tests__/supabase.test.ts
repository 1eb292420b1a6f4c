import { describe, it, expect } from "vitest";
import { createClient } from "@supabase/supabase-js";
import { createSupabaseSink } from "../supabase";
import { sampleRecords } from "./fixtures";

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** In-process stand-in for the REST endpoints the sink calls. */
function fakeRest(options: { chapterError?: string } = {}) {
  const tables: { ebooks: Row[]; chapters: Row[] } = { ebooks: [], chapters: [] };
  const requests: string[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? "GET";
    const table = url.pathname.replace("/rest/v1/", "");
    requests.push(`${method} ${table}`);
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;

    if (table === "ebooks" && method === "POST" && isRow(body)) {
      const row = { ...body, id: `ebook-${tables.ebooks.length + 1}` };
      tables.ebooks.push(row);
      return new Response(JSON.stringify({ id: row.id }), { status: 201 });
    }
    if (table === "ebooks" && method === "DELETE") {
      const id = url.searchParams.get("id")?.replace(/^eq\./, "");
      tables.ebooks = tables.ebooks.filter((row) => row.id !== id);
      return new Response(null, { status: 204 });
    }
    if (table === "chapters" && method === "POST" && Array.isArray(body)) {
      if (options.chapterError) {
        return new Response(JSON.stringify({ message: options.chapterError, code: "23503" }), { status: 409 });
      }
      tables.chapters.push(...body.filter(isRow));
      return new Response(null, { status: 201 });
    }
    return new Response(JSON.stringify({ message: `unexpected ${method} ${table}` }), { status: 400 });
  };

  const client = createClient("http://localhost:54321", "test-secret", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fetchImpl },
  });
  return { client, tables, requests };
}

describe("createSupabaseSink", () => {
  it("inserts the ebook, then its chapters under the new id", async () => {
    const { client, tables } = fakeRest();

    const id = await createSupabaseSink(client).insert(sampleRecords());

    expect(id).toBe("ebook-1");
    expect(tables.ebooks).toHaveLength(1);
    expect(tables.ebooks[0].title_en).toBe("Men's Protocol");
    expect(tables.chapters.map((c) => [c.chapter_number, c.ebook_id])).toEqual([
      [1, "ebook-1"],
      [2, "ebook-1"],
    ]);
  });

  it("removes the ebook row when the chapters cannot be inserted", async () => {
    const { client, tables, requests } = fakeRest({ chapterError: "bad row" });

    await expect(createSupabaseSink(client).insert(sampleRecords())).rejects.toThrow(
      "persistence: chapter insert failed: bad row"
    );

    expect(tables.ebooks).toEqual([]);
    expect(tables.chapters).toEqual([]);
    expect(requests).toEqual(["POST ebooks", "POST chapters", "DELETE ebooks"]);
  });
});
