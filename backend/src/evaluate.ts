#!/usr/bin/env node
/**
 * Evaluation Job Entrypoint
 *
 * Run: npx tsx backend/src/evaluate.ts
 */

import { env } from './config/env.js';
import { moduleLogger } from './common/logger.js';
import { createRegistrySync } from './modules/registry/index.js';
import { runEvaluationJob } from './modules/evaluation/index.js';

process.exitCode = await runEvaluationJob({
  paramsPath: env.PARAMS_PATH,
  evalMetricsPath: env.EVAL_METRICS_PATH,
  trainMetricsPath: env.TRAIN_METRICS_PATH,
  logger: moduleLogger('evaluation'),
  createRegistry: (params) =>
    createRegistrySync(params, {
      timeoutMs: env.REGISTRY_TIMEOUT_MS,
      proxyUrl: env.REGISTRY_PROXY_URL,
      logger: moduleLogger('registry'),
    }),
});
