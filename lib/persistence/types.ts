/** Row shapes written to the `ebooks` and `chapters` tables. */

export interface EbookRecord {
  title_en: string;
  title_pt: string | null;
  slug: string;
  description_en: string | null;
  description_pt: string | null;
  cover_image_url: string;
  price_usd: number;
  price_brl: number;
  /** Sum of the chapters' read times. */
  estimated_read_time_minutes: number;
  status: "draft";
}

export interface ChapterRecord {
  chapter_number: number;
  title_en: string;
  title_pt: string | null;
  slug: string;
  cover_image_url: string;
  content_en: string | null;
  content_pt: string | null;
  summary_en: string | null;
  summary_pt: string | null;
  estimated_read_time_minutes: number;
  is_free_preview: boolean;
  is_published: boolean;
}

export interface WriteRecords {
  ebook: EbookRecord;
  chapters: ChapterRecord[];
  notices: string[];
}

export interface ImageFile {
  bytes: Uint8Array;
  filename: string;
}

export interface ImageUploader {
  /** Store the image under `<folder>/<filename>`; null when the upload failed. */
  upload(image: ImageFile, folder: string): Promise<string | null>;
}

export interface EbookSink {
  /** Insert the ebook and its chapters, returning the new ebook id. */
  insert(records: WriteRecords): Promise<string>;
}
