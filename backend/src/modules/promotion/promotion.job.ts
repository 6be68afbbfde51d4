/**
 * Promotion Job
 * =============
 * params + evaluation record → PromotionGate → exit code.
 *
 *   0  promoted (local, with or without registry)
 *   1  accuracy below threshold
 *   2  configuration, metrics or artifact error
 *   3  another promotion holds the lock
 */

import { AppError, EXIT_CODES, ThresholdNotMetError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { loadParams, type RegistryParams } from '../../config/params.js';
import { loadEvaluationMetrics, loadTrainingRecord } from '../evaluation/metrics.source.js';
import type { RegistrySync } from '../registry/registry.sync.js';
import { PromotionGate } from './promotion.gate.js';
import type { PromotionResult } from './promotion.types.js';

export interface PromotionJobContext {
  paramsPath: string;
  evalMetricsPath: string;
  trainMetricsPath: string;
  lockStaleMs: number;
  logger: Logger;
  createRegistry: (params: RegistryParams | null) => RegistrySync | null;
}

export async function executePromotionJob(ctx: PromotionJobContext): Promise<PromotionResult> {
  const params = await loadParams(ctx.paramsPath);
  const metrics = await loadEvaluationMetrics(ctx.evalMetricsPath);
  const training = await loadTrainingRecord(ctx.trainMetricsPath);

  ctx.logger.info(
    { accuracy: metrics.accuracy, minAccuracy: params.promote.minAccuracy, runId: training?.runId ?? null },
    'Evaluating model for promotion'
  );

  const gate = new PromotionGate({
    registry: ctx.createRegistry(params.registry),
    logger: ctx.logger,
    lockStaleMs: ctx.lockStaleMs,
  });

  const result = await gate.promote(metrics, params, { runId: training?.runId ?? null });
  if (result.decision.outcome === 'rejected') {
    throw new ThresholdNotMetError(result.decision.accuracy, result.decision.threshold);
  }
  return result;
}

export async function runPromotionJob(ctx: PromotionJobContext): Promise<number> {
  try {
    await executePromotionJob(ctx);
    return EXIT_CODES.OK;
  } catch (err) {
    if (err instanceof ThresholdNotMetError) {
      ctx.logger.error(
        { accuracy: err.accuracy, threshold: err.threshold },
        'Model NOT promoted to production'
      );
      return err.exitCode;
    }
    if (err instanceof AppError) {
      ctx.logger.error({ code: err.code, error: err.message }, 'Promotion failed');
      return err.exitCode;
    }
    ctx.logger.error({ error: errorMessage(err) }, 'Promotion failed unexpectedly');
    return EXIT_CODES.FATAL;
  }
}
