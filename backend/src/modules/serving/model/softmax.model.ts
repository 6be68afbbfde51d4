/**
 * Multinomial (softmax) linear classifier, inference only.
 */

import { BaseClassifier } from './classifier.base.js';
import type { ClassifierMeta } from './classifier.types.js';

export interface SoftmaxParams {
  /** One row per class, one column per feature. */
  weights: number[][];
  bias: number[];
}

export function softmax(z: readonly number[]): number[] {
  const max = Math.max(...z);
  const exps = z.map((v) => Math.exp(v - max));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / sum);
}

export class SoftmaxClassifier extends BaseClassifier {
  readonly kind = 'softmax' as const;
  private readonly params: SoftmaxParams;

  constructor(params: SoftmaxParams, meta: ClassifierMeta) {
    super(meta, params.weights[0]?.length ?? 0);
    this.params = {
      weights: params.weights.map((row) => [...row]),
      bias: [...params.bias],
    };
  }

  protected scores(x: readonly number[]): number[] {
    const logits = this.params.weights.map((row, k) => {
      let z = this.params.bias[k];
      for (let j = 0; j < row.length; j++) {
        z += row[j] * x[j];
      }
      return z;
    });
    return softmax(logits);
  }
}
