import { z } from "zod/v4";

export const outlineChapterSchema = z.object({
  number: z.number().int().positive(),
  title_en: z.string().min(1),
  title_pt: z.string().min(1),
  summary_en: z.string().default(""),
  summary_pt: z.string().default(""),
  key_points: z.array(z.string()).default([]),
});

export const outlineSchema = z.object({
  title_en: z.string().min(1),
  title_pt: z.string().min(1),
  description_en: z.string().default(""),
  description_pt: z.string().default(""),
  chapters: z.array(outlineChapterSchema).min(1),
});

export type OutlineChapter = z.infer<typeof outlineChapterSchema>;
export type Outline = z.infer<typeof outlineSchema>;
