import { z } from 'zod';

const FocusSchema = z.union([z.string(), z.array(z.string())]);

export const OutlineSectionSchema = z.object({
  title: z.string().min(1),
  keywords: z.array(z.string()).optional(),
  content_guide: z.string().optional(),
  key_points: z.array(z.string()).optional(),
  research_focus: FocusSchema.optional(),
});

export const OutlineChapterSchema = OutlineSectionSchema.extend({
  id: z.string().optional(),
  subsections: z
    .union([z.array(OutlineSectionSchema), z.record(OutlineSectionSchema)])
    .optional(),
});

/** Enriched survey outline: chapters keyed by id (or listed), each with optional subsections. */
export const EnrichedOutlineSchema = z.object({
  topic: z.string(),
  chapters: z.union([z.array(OutlineChapterSchema), z.record(OutlineChapterSchema)]),
});

export type OutlineSection = z.infer<typeof OutlineSectionSchema>;
export type OutlineChapter = z.infer<typeof OutlineChapterSchema>;
export type EnrichedOutline = z.infer<typeof EnrichedOutlineSchema>;
