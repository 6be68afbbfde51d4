/**
 * Evaluation Records
 */

/**
 * Metrics of one evaluation run against a held-out split. Frozen once built.
 * Only `accuracy` is guaranteed; the rest are null when the record omits them.
 */
export interface EvaluationMetrics {
  readonly accuracy: number;
  readonly precision: number | null;
  readonly recall: number | null;
  readonly f1: number | null;
  readonly confusionMatrix: ReadonlyArray<ReadonlyArray<number>> | null;
}

/**
 * What the training step leaves behind for later stages.
 */
export interface TrainingRecord {
  /** Registry run that logged the trained model. */
  readonly runId: string | null;
}
