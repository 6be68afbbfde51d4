#!/usr/bin/env node
/**
 * Model Serving Entrypoint
 *
 * Loads the production model once, then starts accepting traffic.
 *
 * Run: npx tsx backend/src/server.ts
 */

import { env } from './config/env.js';
import { loadParams } from './config/params.js';
import { moduleLogger, rootLogger } from './common/logger.js';
import { EXIT_CODES, errorMessage } from './common/errors.js';
import { createRegistrySync } from './modules/registry/index.js';
import { createModelServer } from './modules/serving/index.js';
import { buildApp } from './app.js';

async function main(): Promise<number> {
  const params = await loadParams(env.PARAMS_PATH);
  const logger = moduleLogger('serving');

  const registry = createRegistrySync(params.registry, {
    timeoutMs: env.REGISTRY_TIMEOUT_MS,
    proxyUrl: env.REGISTRY_PROXY_URL,
    logger: moduleLogger('registry'),
  });

  const server = createModelServer({
    registry,
    modelName: params.registry?.modelName ?? null,
    productionModel: params.promote.productionModel,
    logger,
  });

  const state = await server.initialize();
  if (state.status !== 'Ready' && env.SERVE_REQUIRE_MODEL) {
    logger.error({}, 'SERVE_REQUIRE_MODEL is set and no model could be loaded');
    return EXIT_CODES.FATAL;
  }

  const app = buildApp({ state });

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        app.log.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exitCode = EXIT_CODES.FATAL;
      });
    });
  }

  await app.listen({ host: env.HOST, port: env.PORT });
  return EXIT_CODES.OK;
}

try {
  const code = await main();
  if (code !== EXIT_CODES.OK) process.exit(code);
} catch (err) {
  rootLogger.fatal({ error: errorMessage(err) }, 'Server failed to start');
  process.exit(EXIT_CODES.FATAL);
}
