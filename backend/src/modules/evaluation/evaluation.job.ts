/**
 * Evaluation Job
 * ==============
 * Scores the staging artifact on the holdout set and writes the evaluation
 * record that the promotion gate reads. When the training record names a
 * registry run, the metrics are attached to it (best-effort).
 */

import { AppError, ConfigError, EXIT_CODES, RegistryUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { loadParams, type RegistryParams } from '../../config/params.js';
import type { RegistrySync } from '../registry/registry.sync.js';
import { readArtifact } from '../promotion/artifact.store.js';
import { decodeClassifier } from '../serving/model/model.codec.js';
import { readHoldout } from './holdout.reader.js';
import { computeEvaluationMetrics, type ComputedMetrics } from './metrics.compute.js';
import { loadTrainingRecord, toRunMetrics, writeEvaluationMetrics } from './metrics.source.js';

export interface EvaluationJobContext {
  paramsPath: string;
  evalMetricsPath: string;
  trainMetricsPath: string;
  logger: Logger;
  createRegistry: (params: RegistryParams | null) => RegistrySync | null;
}

export async function executeEvaluationJob(ctx: EvaluationJobContext): Promise<ComputedMetrics> {
  const params = await loadParams(ctx.paramsPath);
  if (!params.evaluate) {
    throw new ConfigError('Params file has no "evaluate" section');
  }

  const model = decodeClassifier(await readArtifact(params.promote.stagingModel));
  const holdout = await readHoldout(
    params.evaluate.holdoutData,
    params.evaluate.targetColumn,
    model.featureNames ?? undefined
  );

  if (holdout.featureNames.length !== model.nFeatures) {
    throw new ConfigError(
      `Holdout has ${holdout.featureNames.length} feature columns, model expects ${model.nFeatures}`
    );
  }

  const predictions = holdout.X.map((x) => model.predict(x));
  const metrics = computeEvaluationMetrics(holdout.y, predictions);
  await writeEvaluationMetrics(ctx.evalMetricsPath, metrics);

  ctx.logger.info(
    {
      rows: holdout.y.length,
      accuracy: metrics.accuracy,
      precision: metrics.precision,
      recall: metrics.recall,
      f1: metrics.f1,
      output: ctx.evalMetricsPath,
    },
    'Model evaluated'
  );

  const training = await loadTrainingRecord(ctx.trainMetricsPath);
  const registry = ctx.createRegistry(params.registry);
  if (training?.runId && registry) {
    try {
      await registry.logRunMetrics(training.runId, toRunMetrics(metrics));
      ctx.logger.info({ runId: training.runId }, 'Evaluation metrics attached to training run');
    } catch (err) {
      if (!(err instanceof RegistryUnavailableError)) throw err;
      ctx.logger.warn({ runId: training.runId, error: err.message }, 'Could not attach metrics to training run');
    }
  }

  return metrics;
}

export async function runEvaluationJob(ctx: EvaluationJobContext): Promise<number> {
  try {
    await executeEvaluationJob(ctx);
    return EXIT_CODES.OK;
  } catch (err) {
    if (err instanceof AppError) {
      ctx.logger.error({ code: err.code, error: err.message }, 'Evaluation failed');
      return err.exitCode;
    }
    ctx.logger.error({ error: errorMessage(err) }, 'Evaluation failed unexpectedly');
    return EXIT_CODES.FATAL;
  }
}
