/**
 * EVALUATION MODULE
 */

export type { EvaluationMetrics, TrainingRecord } from './evaluation.types.js';
export { computeEvaluationMetrics } from './metrics.compute.js';
export type { ComputedMetrics } from './metrics.compute.js';
export {
  loadEvaluationMetrics,
  loadTrainingRecord,
  writeEvaluationMetrics,
  toRunMetrics,
} from './metrics.source.js';
export { parseHoldout, readHoldout } from './holdout.reader.js';
export { executeEvaluationJob, runEvaluationJob } from './evaluation.job.js';
export type { EvaluationJobContext } from './evaluation.job.js';
