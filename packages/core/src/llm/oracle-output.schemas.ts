import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const NodeKindSchema = z.enum(['concept', 'method', 'dataset', 'task', 'finding']);

export const EntityExtractionResultSchema = z.object({
  entities: z.array(
    z.object({
      label: z.string().min(1),
      kind: NodeKindSchema,
      confidence: z.number().min(0).max(1),
      sentenceIndex: z.number().int().min(0),
    }),
  ),
});

export type EntityExtractionResult = z.infer<typeof EntityExtractionResultSchema>;

export const EntityExtractionResultJsonSchema = zodToJsonSchema(EntityExtractionResultSchema, {
  name: 'EntityExtractionResult',
  $refStrategy: 'none',
});

export const IdeaDraftResultSchema = z.object({
  title: z.string().min(1),
  hypothesis: z.string().min(1),
  innovationPoints: z.array(z.string()).min(1),
  experimentSketch: z.string().min(1),
});

export type IdeaDraftResult = z.infer<typeof IdeaDraftResultSchema>;

export const IdeaDraftResultJsonSchema = zodToJsonSchema(IdeaDraftResultSchema, {
  name: 'IdeaDraftResult',
  $refStrategy: 'none',
});

const DimensionScoreSchema = z.object({
  score: z.number().min(0).max(10),
  rationale: z.string(),
});

export const NoveltyReviewResultSchema = z.object({
  scores: z.object({
    concept: DimensionScoreSchema,
    method: DimensionScoreSchema,
    application: DimensionScoreSchema,
    evaluation: DimensionScoreSchema,
  }),
  rationale: z.string(),
});

export type NoveltyReviewResult = z.infer<typeof NoveltyReviewResultSchema>;

export const NoveltyReviewResultJsonSchema = zodToJsonSchema(NoveltyReviewResultSchema, {
  name: 'NoveltyReviewResult',
  $refStrategy: 'none',
});

export const FeasibilityReviewResultSchema = z.object({
  scores: z.object({
    relevance: DimensionScoreSchema,
    'resource-requirement': DimensionScoreSchema,
    risk: DimensionScoreSchema,
  }),
  rationale: z.string(),
});

export type FeasibilityReviewResult = z.infer<typeof FeasibilityReviewResultSchema>;

export const FeasibilityReviewResultJsonSchema = zodToJsonSchema(FeasibilityReviewResultSchema, {
  name: 'FeasibilityReviewResult',
  $refStrategy: 'none',
});
