/**
 * MODEL REGISTRY MODULE
 */

import { MlflowRegistryClient } from '../../clients/mlflow.client.js';
import type { Logger } from '../../common/logger.js';
import type { RegistryParams } from '../../config/params.js';
import { RegistrySync } from './registry.sync.js';

export * from './registry.types.js';
export * from './registry.selection.js';
export { RegistrySync } from './registry.sync.js';
export type { RegistrySyncOptions } from './registry.sync.js';

export interface RegistryConnectionOptions {
  timeoutMs: number;
  proxyUrl?: string;
  logger?: Logger;
}

/**
 * RegistrySync over the MLflow REST API, or null when the params file has no
 * registry section.
 */
export function createRegistrySync(
  params: RegistryParams | null,
  options: RegistryConnectionOptions
): RegistrySync | null {
  if (!params) return null;

  const client = new MlflowRegistryClient({
    trackingUri: params.trackingUri,
    timeoutMs: options.timeoutMs,
    proxyUrl: options.proxyUrl,
  });

  return new RegistrySync(client, {
    timeoutMs: options.timeoutMs,
    artifactFile: params.artifactFile,
    logger: options.logger,
  });
}
