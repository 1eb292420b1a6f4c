import fs from "node:fs";
import path from "node:path";
import { totalReadTime, type EbookBundle } from "@/lib/pipeline/assemble/ebook-bundle";
import type { ChapterRecord, ImageUploader, WriteRecords } from "./types";

const LOCAL_PREFIX = "images/";

export interface WriteRecordsOptions {
  /** Directory the local `images/<file>` references resolve against. */
  imagesDir: string;
  uploader?: ImageUploader;
}

/**
 * Turn a bundle into table rows, uploading locally generated images first.
 * An image that can't be uploaded keeps its local reference.
 */
export async function assembleWriteRecords(
  bundle: EbookBundle,
  options: WriteRecordsOptions
): Promise<WriteRecords> {
  const notices: string[] = [];
  const { ebook } = bundle;
  const { uploader } = options;

  if (!uploader) {
    notices.push("No image uploader configured; local image references kept");
  }

  const resolveImage = async (reference: string, folder: string): Promise<string> => {
    if (!uploader || !reference.startsWith(LOCAL_PREFIX)) return reference;

    const filename = reference.slice(LOCAL_PREFIX.length);
    const filePath = path.join(options.imagesDir, filename);
    if (!fs.existsSync(filePath)) {
      notices.push(`Image ${reference} was not found; kept the local reference`);
      return reference;
    }

    const url = await uploader.upload({ bytes: fs.readFileSync(filePath), filename }, folder);
    if (url === null) {
      notices.push(`Image ${reference} could not be uploaded; kept the local reference`);
      return reference;
    }
    return url;
  };

  const coverUrl = await resolveImage(ebook.cover_image_url, `covers/${ebook.slug}`);

  const chapters: ChapterRecord[] = [];
  for (const ch of bundle.chapters) {
    chapters.push({
      chapter_number: ch.chapter_number,
      title_en: ch.title_en,
      title_pt: ch.title_pt,
      slug: ch.slug,
      cover_image_url: await resolveImage(ch.cover_image_url, `chapters/${ebook.slug}`),
      content_en: ch.content_en,
      content_pt: ch.content_pt,
      summary_en: ch.summary_en,
      summary_pt: ch.summary_pt,
      estimated_read_time_minutes: ch.estimated_read_time_minutes,
      is_free_preview: ch.is_free_preview,
      is_published: ch.is_published,
    });
  }

  return {
    ebook: {
      title_en: ebook.title_en,
      title_pt: ebook.title_pt,
      slug: ebook.slug,
      description_en: ebook.description_en,
      description_pt: ebook.description_pt,
      cover_image_url: coverUrl,
      price_usd: ebook.price_usd,
      price_brl: ebook.price_brl,
      estimated_read_time_minutes: totalReadTime(bundle.chapters),
      status: ebook.status,
    },
    chapters,
    notices,
  };
}
