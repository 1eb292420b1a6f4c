import type { Pricing } from "@/lib/config";
import { PipelineError } from "../errors";
import { slugify } from "../slug";
import { estimateReadTime } from "./read-time";

/** A chapter as produced by either generation mode, before assembly. */
export interface ChapterDraft {
  chapter_number: number;
  title_en: string;
  title_pt: string;
  summary_en: string;
  summary_pt: string;
  content_en: string;
  content_pt: string;
  cover_image_url: string;
  translation_gap?: boolean;
}

export interface EbookDraft {
  title_en: string;
  title_pt: string;
  description_en: string;
  description_pt: string;
  cover_image_url: string;
}

export interface BundleChapter {
  chapter_number: number;
  title_en: string;
  title_pt: string;
  slug: string;
  summary_en: string;
  summary_pt: string;
  content_en: string;
  content_pt: string;
  cover_image_url: string;
  estimated_read_time_minutes: number;
  is_free_preview: boolean;
  is_published: false;
  /** The Portuguese source had no chapter with this number. */
  translation_gap: boolean;
}

export interface BundleEbook {
  title_en: string;
  title_pt: string;
  slug: string;
  description_en: string;
  description_pt: string;
  cover_image_url: string;
  price_usd: number;
  price_brl: number;
  status: "draft";
}

export interface EbookBundle {
  ebook: BundleEbook;
  /** Ascending by chapter_number. */
  chapters: BundleChapter[];
  notices: string[];
}

export function assembleBundle(
  ebook: EbookDraft,
  drafts: readonly ChapterDraft[],
  options: { pricing: Pricing; notices?: readonly string[] }
): EbookBundle {
  const seen = new Set<number>();
  for (const d of drafts) {
    if (!Number.isInteger(d.chapter_number) || d.chapter_number < 1) {
      throw new PipelineError("assembly", `invalid chapter number ${d.chapter_number}`);
    }
    if (seen.has(d.chapter_number)) {
      throw new PipelineError("assembly", `duplicate chapter number ${d.chapter_number}`);
    }
    seen.add(d.chapter_number);
  }

  const chapters = [...drafts]
    .sort((a, b) => a.chapter_number - b.chapter_number)
    .map(
      (d): BundleChapter => ({
        chapter_number: d.chapter_number,
        title_en: d.title_en,
        title_pt: d.title_pt,
        slug: slugify(d.title_en),
        summary_en: d.summary_en,
        summary_pt: d.summary_pt,
        content_en: d.content_en,
        content_pt: d.content_pt,
        cover_image_url: d.cover_image_url,
        estimated_read_time_minutes: estimateReadTime(d.content_en),
        is_free_preview: d.chapter_number === 1,
        is_published: false,
        translation_gap: d.translation_gap ?? false,
      })
    );

  return {
    ebook: {
      title_en: ebook.title_en,
      title_pt: ebook.title_pt,
      slug: slugify(ebook.title_en),
      description_en: ebook.description_en,
      description_pt: ebook.description_pt,
      cover_image_url: ebook.cover_image_url,
      price_usd: options.pricing.priceUsd,
      price_brl: options.pricing.priceBrl,
      status: "draft",
    },
    chapters,
    notices: [...(options.notices ?? [])],
  };
}

/** Ebook read time: the sum over its chapters. */
export function totalReadTime(chapters: readonly Pick<BundleChapter, "estimated_read_time_minutes">[]): number {
  return chapters.reduce((sum, c) => sum + c.estimated_read_time_minutes, 0);
}
