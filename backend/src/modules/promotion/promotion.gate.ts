/**
 * PromotionGate
 * =============
 * Threshold decision plus the promotion side effects.
 *
 * RULES:
 * - accuracy >= min_accuracy promotes (inclusive)
 * - a rejected model touches nothing: no lock, no copy, no registry call
 * - the local copy is authoritative; the registry transition is best-effort
 *   and its failure never undoes the copy
 */

import { RegistryUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { TimeoutError } from '../../common/timeout.js';
import type { Params, RegistryParams } from '../../config/params.js';
import type { EvaluationMetrics } from '../evaluation/evaluation.types.js';
import type { RegistrySync } from '../registry/registry.sync.js';
import { copyArtifactAtomic } from './artifact.store.js';
import { PromotionLock } from './promotion.lock.js';
import type { PromotionDecision, PromotionResult, RegistrySyncOutcome } from './promotion.types.js';

// ═══════════════════════════════════════════════════════════════
// DECISION
// ═══════════════════════════════════════════════════════════════

export function decide(metrics: EvaluationMetrics, threshold: number): PromotionDecision {
  return {
    accuracy: metrics.accuracy,
    threshold,
    outcome: metrics.accuracy >= threshold ? 'promoted' : 'rejected',
  };
}

// ═══════════════════════════════════════════════════════════════
// GATE
// ═══════════════════════════════════════════════════════════════

export interface PromotionGateDeps {
  registry: RegistrySync | null;
  logger: Logger;
  lockStaleMs: number;
}

export interface PromotionContext {
  /** Training run of the staging artifact, used to find its registry version. */
  runId?: string | null;
}

export class PromotionGate {
  constructor(private readonly deps: PromotionGateDeps) {}

  async promote(
    metrics: EvaluationMetrics,
    params: Params,
    context: PromotionContext = {}
  ): Promise<PromotionResult> {
    const decision = decide(metrics, params.promote.minAccuracy);
    const { logger } = this.deps;

    logger.info(
      { accuracy: decision.accuracy, threshold: decision.threshold, outcome: decision.outcome },
      'Promotion gate evaluated'
    );

    if (decision.outcome === 'rejected') {
      return { decision, localCopy: null, registry: null };
    }

    const { stagingModel, productionModel } = params.promote;
    const lock = new PromotionLock(`${productionModel}.lock`, {
      staleMs: this.deps.lockStaleMs,
      logger,
    });

    return lock.withLock(async () => {
      const copy = await copyArtifactAtomic(stagingModel, productionModel);
      logger.info(
        { source: copy.source, destination: copy.destination, bytes: copy.bytes },
        'Model promoted to production'
      );

      const registry = await this.syncRegistry(params.registry, context);
      return {
        decision,
        localCopy: { destination: copy.destination, bytes: copy.bytes },
        registry,
      };
    });
  }

  private async syncRegistry(
    registryParams: RegistryParams | null,
    context: PromotionContext
  ): Promise<RegistrySyncOutcome> {
    const { registry, logger } = this.deps;

    if (!registry || !registryParams) {
      logger.info({}, 'Registry not configured, skipping stage transition');
      return { status: 'skipped', reason: 'registry not configured' };
    }

    try {
      const version = await registry.promoteToProduction(registryParams.modelName, {
        runId: context.runId ?? null,
        policy: registryParams.versionSelection,
      });
      logger.info(
        { model: version.name, version: version.version, stage: version.stage },
        'Registry version transitioned to Production'
      );
      return { status: 'promoted', version };
    } catch (err) {
      // Local promotion already happened and stays in place.
      const message = errorMessage(err);
      const registryUnavailable = err instanceof RegistryUnavailableError;
      logger.warn(
        {
          model: registryParams.modelName,
          error: message,
          registryUnavailable,
          // The request was cut off at the deadline; the registry may have applied it.
          stageUnconfirmed: err instanceof RegistryUnavailableError && err.cause instanceof TimeoutError,
        },
        'Registry transition failed, local promotion kept'
      );
      return { status: 'failed', error: message };
    }
  }
}
