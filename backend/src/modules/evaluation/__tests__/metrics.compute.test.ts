import { describe, it, expect } from 'vitest';
import { MetricsUnavailableError } from '../../../common/errors.js';
import { computeEvaluationMetrics } from '../metrics.compute.js';

describe('computeEvaluationMetrics', () => {
  it('should compute accuracy, weighted scores and the confusion matrix', () => {
    const m = computeEvaluationMetrics([0, 0, 1, 1, 2, 2], [0, 1, 1, 1, 2, 0]);

    expect(m.accuracy).toBeCloseTo(2 / 3, 10);
    expect(m.precision).toBeCloseTo(13 / 18, 10);
    expect(m.recall).toBeCloseTo(2 / 3, 10);
    expect(m.f1).toBeCloseTo(59 / 90, 10);
    expect(m.labels).toEqual([0, 1, 2]);
    expect(m.confusionMatrix).toEqual([
      [1, 1, 0],
      [0, 2, 0],
      [1, 0, 1],
    ]);
  });

  it('should score a perfect prediction as 1', () => {
    const m = computeEvaluationMetrics([1, 0, 1], [1, 0, 1]);
    expect(m.accuracy).toBe(1);
    expect(m.precision).toBeCloseTo(1, 10);
    expect(m.recall).toBeCloseTo(1, 10);
    expect(m.f1).toBeCloseTo(1, 10);
  });

  it('should count a class that is never predicted as zero precision', () => {
    const m = computeEvaluationMetrics([0, 1], [0, 0]);

    expect(m.accuracy).toBe(0.5);
    // class 0: p=0.5 r=1, class 1: p=0 r=0
    expect(m.precision).toBeCloseTo(0.25, 10);
    expect(m.recall).toBeCloseTo(0.5, 10);
    expect(m.f1).toBeCloseTo(1 / 3, 10);
  });

  it('should include predicted labels missing from the truth', () => {
    const m = computeEvaluationMetrics([0, 0], [0, 5]);
    expect(m.labels).toEqual([0, 5]);
    expect(m.confusionMatrix).toEqual([
      [1, 1],
      [0, 0],
    ]);
  });

  it('should be frozen', () => {
    const m = computeEvaluationMetrics([0], [0]);
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.confusionMatrix)).toBe(true);
  });

  it('should refuse empty or mismatched input', () => {
    expect(() => computeEvaluationMetrics([], [])).toThrow(MetricsUnavailableError);
    expect(() => computeEvaluationMetrics([0, 1], [0])).toThrow(
      'Cannot compute metrics for 2 labels and 1 predictions'
    );
  });
});
