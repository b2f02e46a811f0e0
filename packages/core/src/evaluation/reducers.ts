import type { AggregationReducer } from '@ideaweaver/schemas/src/ideation.schema.js';
import { mean, median } from '@ideaweaver/shared/src/utils/math.js';

const REDUCERS: Readonly<Record<AggregationReducer, (values: readonly number[]) => number>> = {
  mean,
  median,
  min: (values) => (values.length === 0 ? 0 : Math.min(...values)),
};

/** Folds per-dimension scores into one aggregate score, unrounded so thresholds see the exact value. */
export function aggregateScores(reducer: AggregationReducer, scores: readonly number[]): number {
  return REDUCERS[reducer](scores);
}
