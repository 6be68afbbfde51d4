/**
 * MODEL SERVING MODULE
 */

import type { Logger } from '../../common/logger.js';
import type { RegistrySync } from '../registry/registry.sync.js';
import { ModelServer } from './serving.state.js';
import { LocalFileModelStrategy, RegistryModelStrategy } from './serving.strategies.js';
import type { ModelAcquisitionStrategy } from './serving.types.js';

export * from './serving.types.js';
export type { Classifier, ClassifierKind } from './model/classifier.types.js';
export { decodeClassifier } from './model/model.codec.js';
export { ModelServer, UNINITIALIZED } from './serving.state.js';
export { LocalFileModelStrategy, RegistryModelStrategy, contentLabel } from './serving.strategies.js';
export { registerServingRoutes } from './serving.routes.js';

export interface ModelServerOptions {
  registry: RegistrySync | null;
  modelName: string | null;
  productionModel: string;
  logger: Logger;
}

/**
 * Registry first (when configured), then the local production file.
 */
export function createModelServer(options: ModelServerOptions): ModelServer {
  const strategies: ModelAcquisitionStrategy[] = [];
  if (options.registry && options.modelName) {
    strategies.push(new RegistryModelStrategy(options.registry, options.modelName));
  }
  strategies.push(new LocalFileModelStrategy(options.productionModel));
  return new ModelServer(strategies, options.logger);
}
