import { describe, it, expect } from 'vitest';
import { createIdeationConfig, validateEnrichedOutline, validateIdeationConfig } from './validators.js';
import { SchemaValidationError } from '@ideaweaver/shared/src/utils/errors.js';

describe('validateIdeationConfig', () => {
  it('should fill every option with its default', () => {
    const config = validateIdeationConfig({});

    expect(config.generationConcurrency).toBe(6);
    expect(config.evaluationConcurrency).toBe(6);
    expect(config.maxRounds).toBe(2);
    expect(config.noveltyThreshold).toBe(8);
    expect(config.feasibilityThreshold).toBe(7);
    expect(config.maxInitialIdeas).toBe(6);
    expect(config.runDeadlineMs).toBeUndefined();
    expect(config.extraction).toBe('lexical');
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000, maxDelayMs: 10000, jitter: true });
    expect(config.graph.salienceWeights).toEqual({ frequency: 0.4, outline: 0.35, degree: 0.25 });
    expect(config.detector.combinationHopLimit).toBe(3);
    expect(config.aggregation).toEqual({ novelty: 'mean', feasibility: 'mean' });
  });

  it('should keep nested defaults when only part of a section is given', () => {
    const config = validateIdeationConfig({ detector: { gapDegreeThreshold: 2 } });

    expect(config.detector.gapDegreeThreshold).toBe(2);
    expect(config.detector.gapSalienceThreshold).toBe(0.6);
    expect(config.detector.priorityWeights).toEqual({ salience: 0.8, distance: 0.2 });
  });

  it('should reject a zero concurrency limit', () => {
    expect(() => validateIdeationConfig({ generationConcurrency: 0 })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject thresholds outside the score range', () => {
    expect(() => validateIdeationConfig({ noveltyThreshold: 11 })).toThrow(SchemaValidationError);
  });

  it('should reject an unknown aggregation reducer', () => {
    expect(() => validateIdeationConfig({ aggregation: { novelty: 'harmonic' } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should report the path of a backoff ceiling below its base', () => {
    try {
      validateIdeationConfig({ retry: { baseDelayMs: 500, maxDelayMs: 100 } });
      expect.unreachable('validation should have failed');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect((error as SchemaValidationError).validationErrors).toEqual([
        'retry.maxDelayMs: retry.maxDelayMs must be at least retry.baseDelayMs',
      ]);
    }
  });
});

describe('createIdeationConfig', () => {
  it('should overlay overrides on the defaults', () => {
    const config = createIdeationConfig({ maxRounds: 4, runDeadlineMs: 60_000 });

    expect(config.maxRounds).toBe(4);
    expect(config.runDeadlineMs).toBe(60_000);
    expect(config.noveltyThreshold).toBe(8);
  });
});

describe('validateEnrichedOutline', () => {
  it('should accept chapters keyed by id with nested subsections', () => {
    const outline = validateEnrichedOutline({
      topic: 'Graph learning',
      chapters: {
        '1': {
          title: 'Introduction',
          key_points: ['message passing'],
          research_focus: 'scalability',
          subsections: [{ title: 'Background', keywords: ['graphs'] }],
        },
      },
    });

    expect(outline.topic).toBe('Graph learning');
  });

  it('should reject a chapter without a title', () => {
    expect(() => validateEnrichedOutline({ topic: 't', chapters: [{ key_points: [] }] })).toThrow(
      SchemaValidationError,
    );
  });
});
