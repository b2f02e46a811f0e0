import { z } from 'zod';
import type { DeepReadonly } from '@ideaweaver/shared/src/types/utility.types.js';

const unitInterval = z.number().min(0).max(1);
const score = z.number().min(0).max(10);

const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().min(0).default(2000),
  maxDelayMs: z.number().int().min(0).default(10000),
  jitter: z.boolean().default(true),
});

const SalienceWeightsSchema = z.object({
  frequency: unitInterval.default(0.4),
  outline: unitInterval.default(0.35),
  degree: unitInterval.default(0.25),
});

const GraphConfigSchema = z.object({
  cooccurrenceWindow: z.number().int().min(0).default(1),
  defaultSectionWeight: unitInterval.default(0.5),
  salienceWeights: SalienceWeightsSchema.default({}),
});

const PriorityWeightsSchema = z.object({
  salience: unitInterval.default(0.8),
  distance: unitInterval.default(0.2),
});

const DetectorConfigSchema = z.object({
  gapSalienceThreshold: unitInterval.default(0.6),
  gapDegreeThreshold: z.number().int().min(0).default(1),
  combinationSalienceThreshold: unitInterval.default(0.7),
  combinationHopLimit: z.number().int().min(1).default(3),
  minCommunitySize: z.number().int().min(2).default(3),
  minCommunityDensity: unitInterval.default(0.5),
  minPatternSize: z.number().int().min(1).default(2),
  priorityWeights: PriorityWeightsSchema.default({}),
});

export const AggregationReducerSchema = z.enum(['mean', 'min', 'median']);

const AggregationConfigSchema = z.object({
  novelty: AggregationReducerSchema.default('mean'),
  feasibility: AggregationReducerSchema.default('mean'),
});

export const IdeationConfigSchema = z
  .object({
    $schema: z.string().optional(),
    generationConcurrency: z.number().int().min(1).default(6),
    evaluationConcurrency: z.number().int().min(1).default(6),
    maxRounds: z.number().int().min(0).default(2),
    noveltyThreshold: score.default(8.0),
    feasibilityThreshold: score.default(7.0),
    maxInitialIdeas: z.number().int().min(0).default(6),
    runDeadlineMs: z.number().int().positive().optional(),
    callTimeoutMs: z.number().int().positive().default(120_000),
    retrievalTopK: z.number().int().min(0).default(5),
    extraction: z.enum(['lexical', 'llm']).default('lexical'),
    retry: RetryPolicySchema.default({}),
    graph: GraphConfigSchema.default({}),
    detector: DetectorConfigSchema.default({}),
    aggregation: AggregationConfigSchema.default({}),
  })
  .refine((config) => config.retry.maxDelayMs >= config.retry.baseDelayMs, {
    message: 'retry.maxDelayMs must be at least retry.baseDelayMs',
    path: ['retry', 'maxDelayMs'],
  });

export type IdeationConfigInput = z.input<typeof IdeationConfigSchema>;
export type IdeationConfig = DeepReadonly<z.output<typeof IdeationConfigSchema>>;
export type RetryPolicy = IdeationConfig['retry'];
export type GraphConfig = IdeationConfig['graph'];
export type DetectorConfig = IdeationConfig['detector'];
export type AggregationReducer = z.infer<typeof AggregationReducerSchema>;
