#!/usr/bin/env node
/**
 * Promotion Job Entrypoint
 *
 * Exit codes: 0 promoted, 1 below threshold, 2 config/metrics/artifact error,
 * 3 another promotion is running.
 *
 * Run: npx tsx backend/src/promote.ts
 */

import { env } from './config/env.js';
import { moduleLogger } from './common/logger.js';
import { createRegistrySync } from './modules/registry/index.js';
import { runPromotionJob } from './modules/promotion/index.js';

const logger = moduleLogger('promotion');

process.exitCode = await runPromotionJob({
  paramsPath: env.PARAMS_PATH,
  evalMetricsPath: env.EVAL_METRICS_PATH,
  trainMetricsPath: env.TRAIN_METRICS_PATH,
  lockStaleMs: env.PROMOTION_LOCK_STALE_MS,
  logger,
  createRegistry: (params) =>
    createRegistrySync(params, {
      timeoutMs: env.REGISTRY_TIMEOUT_MS,
      proxyUrl: env.REGISTRY_PROXY_URL,
      logger: moduleLogger('registry'),
    }),
});
