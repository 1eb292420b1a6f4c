import type { ClassifiedChapter } from "./classification-schema";

export interface ChapterPair {
  number: number;
  en: ClassifiedChapter;
  /** Null when the Portuguese source has no chapter with this number. */
  pt: ClassifiedChapter | null;
}

function firstByNumber(
  chapters: readonly ClassifiedChapter[],
  language: string,
  notices: string[]
): Map<number, ClassifiedChapter> {
  const byNumber = new Map<number, ClassifiedChapter>();
  for (const chapter of chapters) {
    if (byNumber.has(chapter.number)) {
      notices.push(`${language} chapter ${chapter.number} appears more than once; kept the first`);
      continue;
    }
    byNumber.set(chapter.number, chapter);
  }
  return byNumber;
}

/**
 * Match English and Portuguese chapters by number.
 *
 * English decides the chapter set. A missing Portuguese chapter leaves
 * `pt` null (a translation gap); Portuguese-only numbers are dropped.
 * Every such adjustment is reported in `notices`.
 */
export function pairChapters(
  en: readonly ClassifiedChapter[],
  pt: readonly ClassifiedChapter[]
): { pairs: ChapterPair[]; notices: string[] } {
  const notices: string[] = [];
  const enByNumber = firstByNumber(en, "English", notices);
  const ptByNumber = firstByNumber(pt, "Portuguese", notices);

  const pairs: ChapterPair[] = [...enByNumber.entries()]
    .sort(([a], [b]) => a - b)
    .map(([number, enChapter]) => {
      const ptChapter = ptByNumber.get(number) ?? null;
      if (!ptChapter) {
        notices.push(
          `Portuguese chapter ${number} is missing; using the English title and empty Portuguese content`
        );
      }
      return { number, en: enChapter, pt: ptChapter };
    });

  for (const number of [...ptByNumber.keys()].sort((a, b) => a - b)) {
    if (!enByNumber.has(number)) {
      notices.push(`Portuguese chapter ${number} has no English counterpart and was dropped`);
    }
  }

  return { pairs, notices };
}
