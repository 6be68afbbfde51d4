/**
 * Classifier Contract
 */

export type ClassifierKind = 'softmax' | 'logistic';

export interface FeatureScaler {
  mean: number[];
  std: number[];
}

/**
 * A loaded, read-only classifier. Instances are shared by every request
 * handler and never mutated after decoding.
 */
export interface Classifier {
  readonly kind: ClassifierKind;
  readonly classes: readonly number[];
  readonly nFeatures: number;
  readonly featureNames: readonly string[] | null;

  /** Probability per entry of `classes`, summing to 1. */
  predictProba(x: readonly number[]): number[];
  predict(x: readonly number[]): number;
  /** Label of the most probable class in a vector from `predictProba`. */
  labelFor(probability: readonly number[]): number;
}

export interface ClassifierMeta {
  classes: number[];
  featureNames: string[] | null;
  scaler: FeatureScaler | null;
}
