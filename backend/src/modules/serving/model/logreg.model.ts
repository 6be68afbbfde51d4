/**
 * Binary Logistic Regression (inference only)
 */

import { BaseClassifier } from './classifier.base.js';
import type { ClassifierMeta } from './classifier.types.js';

function sigmoid(z: number): number {
  // Numeric stability
  if (z >= 0) {
    const ez = Math.exp(-z);
    return 1 / (1 + ez);
  } else {
    const ez = Math.exp(z);
    return ez / (1 + ez);
  }
}

export interface LogRegParams {
  weights: number[];
  bias: number;
}

export class LogisticRegression extends BaseClassifier {
  readonly kind = 'logistic' as const;
  private readonly params: LogRegParams;

  constructor(params: LogRegParams, meta: ClassifierMeta) {
    super(meta, params.weights.length);
    this.params = { weights: [...params.weights], bias: params.bias };
  }

  /** P(classes[1] | x) */
  predictProbaOne(x: readonly number[]): number {
    let z = this.params.bias;
    for (let j = 0; j < this.params.weights.length; j++) {
      z += this.params.weights[j] * x[j];
    }
    return sigmoid(z);
  }

  protected scores(x: readonly number[]): number[] {
    const p = this.predictProbaOne(x);
    return [1 - p, p];
  }
}
