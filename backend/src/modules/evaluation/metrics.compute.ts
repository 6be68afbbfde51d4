/**
 * Classification metrics: accuracy, support-weighted precision / recall / F1
 * and the confusion matrix over the sorted union of labels.
 */

import { MetricsUnavailableError } from '../../common/errors.js';
import type { EvaluationMetrics } from './evaluation.types.js';

export interface ComputedMetrics extends EvaluationMetrics {
  readonly labels: readonly number[];
}

export function computeEvaluationMetrics(yTrue: readonly number[], yPred: readonly number[]): ComputedMetrics {
  if (yTrue.length === 0 || yTrue.length !== yPred.length) {
    throw new MetricsUnavailableError(
      `Cannot compute metrics for ${yTrue.length} labels and ${yPred.length} predictions`
    );
  }

  const labels = [...new Set([...yTrue, ...yPred])].sort((a, b) => a - b);
  const index = new Map(labels.map((label, i) => [label, i]));
  const matrix = labels.map(() => labels.map(() => 0));

  let correct = 0;
  for (let i = 0; i < yTrue.length; i++) {
    const t = index.get(yTrue[i]) ?? 0;
    const p = index.get(yPred[i]) ?? 0;
    matrix[t][p] += 1;
    if (t === p) correct += 1;
  }

  const n = yTrue.length;
  let precision = 0;
  let recall = 0;
  let f1 = 0;

  labels.forEach((_, k) => {
    const tp = matrix[k][k];
    const support = matrix[k].reduce((a, b) => a + b, 0);
    const predicted = matrix.reduce((sum, row) => sum + row[k], 0);

    const p = predicted > 0 ? tp / predicted : 0;
    const r = support > 0 ? tp / support : 0;
    const f = p + r > 0 ? (2 * p * r) / (p + r) : 0;

    const weight = support / n;
    precision += p * weight;
    recall += r * weight;
    f1 += f * weight;
  });

  return Object.freeze({
    accuracy: correct / n,
    precision,
    recall,
    f1,
    confusionMatrix: Object.freeze(matrix.map((row) => Object.freeze(row))),
    labels: Object.freeze(labels),
  });
}
