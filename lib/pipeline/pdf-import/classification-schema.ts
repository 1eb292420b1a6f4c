import { z } from "zod/v4";

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

export const classifiedChapterSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().min(1),
  summary: optionalString,
  image_prompt: optionalString,
  /** Raw blocks; each is read by parseBlock at render time. */
  blocks: z.array(z.unknown()).default([]),
});

export const classificationSchema = z.object({
  title: z.string().min(1),
  description: optionalString,
  cover_image_prompt: optionalString,
  chapters: z.array(classifiedChapterSchema).min(1),
});

export type ClassifiedChapter = z.infer<typeof classifiedChapterSchema>;
export type Classification = z.infer<typeof classificationSchema>;
