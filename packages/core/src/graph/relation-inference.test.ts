import { describe, it, expect } from 'vitest';
import { inferRelation } from './relation-inference.js';

describe('inferRelation', () => {
  it('should detect contradiction cues before any other', () => {
    expect(inferRelation('However, dropout outperforms weight decay here.', 'method', 'method')).toBe(
      'contradicts',
    );
  });

  it('should detect comparisons', () => {
    expect(inferRelation('Pruning outperforms distillation.', 'method', 'method')).toBe('compares');
  });

  it('should detect extensions', () => {
    expect(inferRelation('LoRA extends adapter tuning.', 'method', 'method')).toBe('extends');
  });

  it('should detect usage cues', () => {
    expect(inferRelation('We apply attention to speech.', 'concept', 'concept')).toBe('uses');
  });

  it('should infer usage from a method paired with a dataset', () => {
    expect(inferRelation('ResNet and ImageNet appear together.', 'method', 'dataset')).toBe('uses');
  });

  it('should fall back to supports', () => {
    expect(inferRelation('Sparsity and robustness appear together.', 'concept', 'finding')).toBe(
      'supports',
    );
  });
});
