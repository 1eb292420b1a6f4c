import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { requireEnv } from "@/lib/env";
import { PipelineError } from "@/lib/pipeline/errors";
import type { EbookSink, ImageUploader } from "./types";

let _admin: SupabaseClient | null = null;

/**
 * Returns a Supabase admin client (service role).
 * Lazy-initialized, cached for the process lifetime.
 */
export function adminSupabase(): SupabaseClient {
  if (!_admin) {
    const url = requireEnv("SUPABASE_URL");
    const key = requireEnv("SUPABASE_SERVICE_ROLE_KEY");
    _admin = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }
  return _admin;
}

export function createSupabaseUploader(client: SupabaseClient, bucket: string): ImageUploader {
  return {
    async upload({ bytes, filename }, folder) {
      const storagePath = `${folder}/${filename}`;
      const { error } = await client.storage.from(bucket).upload(storagePath, bytes, {
        upsert: true,
        contentType: "image/png",
      });
      if (error) {
        console.error(`[storage] upload failed (${bucket}/${storagePath}): ${error.message}`);
        return null;
      }
      const { data } = client.storage.from(bucket).getPublicUrl(storagePath);
      console.log(`[storage] uploaded ${storagePath}`);
      return data.publicUrl;
    },
  };
}

const ebookIdRow = (row: unknown): string | null =>
  typeof row === "object" && row !== null && "id" in row && typeof row.id === "string" ? row.id : null;

export function createSupabaseSink(client: SupabaseClient): EbookSink {
  return {
    async insert({ ebook, chapters }) {
      const { data, error } = await client.from("ebooks").insert(ebook).select("id").single();
      if (error) {
        throw new PipelineError("persistence", `ebook insert failed: ${error.message}`);
      }
      const ebookId = ebookIdRow(data);
      if (!ebookId) {
        throw new PipelineError("persistence", "ebook insert returned no id");
      }
      console.log(`[db] created ebook ${ebookId} - ${ebook.title_en}`);

      if (chapters.length > 0) {
        const rows = chapters.map((ch) => ({ ...ch, ebook_id: ebookId }));
        const { error: chapterError } = await client.from("chapters").insert(rows);
        if (chapterError) {
          // No ebook without its chapters
          const { error: rollbackError } = await client.from("ebooks").delete().eq("id", ebookId);
          if (rollbackError) {
            console.error(`[db] could not remove ebook ${ebookId}: ${rollbackError.message}`);
          }
          throw new PipelineError("persistence", `chapter insert failed: ${chapterError.message}`);
        }
      }
      return ebookId;
    },
  };
}
