import type { Classifier, ClassifierKind, ClassifierMeta, FeatureScaler } from './classifier.types.js';

/**
 * Shared input handling: dimension check, optional standardization, and
 * argmax over the probability vector.
 */
export abstract class BaseClassifier implements Classifier {
  abstract readonly kind: ClassifierKind;
  readonly classes: readonly number[];
  readonly featureNames: readonly string[] | null;
  private readonly scaler: FeatureScaler | null;

  constructor(meta: ClassifierMeta, readonly nFeatures: number) {
    this.classes = Object.freeze([...meta.classes]);
    this.featureNames = meta.featureNames ? Object.freeze([...meta.featureNames]) : null;
    this.scaler = meta.scaler;
  }

  protected abstract scores(x: readonly number[]): number[];

  predictProba(x: readonly number[]): number[] {
    if (x.length !== this.nFeatures) {
      throw new Error(`Expected ${this.nFeatures} features, got ${x.length}`);
    }
    const proba = this.scores(this.scale(x));
    if (proba.some((p) => !Number.isFinite(p))) {
      throw new Error('Model produced non-finite probabilities');
    }
    return proba;
  }

  predict(x: readonly number[]): number {
    return this.labelFor(this.predictProba(x));
  }

  labelFor(probability: readonly number[]): number {
    if (probability.length !== this.classes.length) {
      throw new Error(`Expected ${this.classes.length} probabilities, got ${probability.length}`);
    }
    // Ties go to the earlier class.
    let best = 0;
    for (let i = 1; i < probability.length; i++) {
      if (probability[i] > probability[best]) best = i;
    }
    return this.classes[best];
  }

  private scale(x: readonly number[]): number[] {
    const scaler = this.scaler;
    if (!scaler) return [...x];
    return x.map((v, i) => (v - scaler.mean[i]) / (scaler.std[i] || 1));
  }
}
