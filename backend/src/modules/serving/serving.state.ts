/**
 * ModelServer
 * ===========
 * One-shot startup acquisition:
 *
 *   Uninitialized → Ready(registry)
 *   Uninitialized → Ready(local)
 *   Uninitialized → Unavailable
 *
 * The resulting state is frozen and handed to the HTTP layer. There is no
 * way back to Uninitialized and no reload.
 */

import type { Logger } from '../../common/logger.js';
import type {
  AcquisitionFailure,
  InitializedState,
  ModelAcquisitionStrategy,
  ReadyState,
  ServerModelState,
  UnavailableState,
  UninitializedState,
} from './serving.types.js';

export const UNINITIALIZED: UninitializedState = Object.freeze<UninitializedState>({
  status: 'Uninitialized',
  model: null,
  source: 'none',
  versionLabel: null,
});

export class ModelServer {
  private current: ServerModelState = UNINITIALIZED;
  private initializing: Promise<InitializedState> | null = null;

  constructor(
    private readonly strategies: readonly ModelAcquisitionStrategy[],
    private readonly logger: Logger
  ) {}

  get state(): ServerModelState {
    return this.current;
  }

  /**
   * Runs acquisition once. Later calls return the same result.
   */
  initialize(): Promise<InitializedState> {
    if (!this.initializing) {
      this.initializing = this.acquire().then((state) => {
        this.current = state;
        return state;
      });
    }
    return this.initializing;
  }

  private async acquire(): Promise<InitializedState> {
    const failures: AcquisitionFailure[] = [];

    for (const strategy of this.strategies) {
      const result = await strategy.acquire();
      if (result.ok) {
        this.logger.info(
          { source: strategy.source, version: result.versionLabel, features: result.model.nFeatures },
          'Model loaded'
        );
        const ready: ReadyState = {
          status: 'Ready',
          model: result.model,
          source: strategy.source,
          versionLabel: result.versionLabel,
          loadedAt: new Date().toISOString(),
        };
        return Object.freeze(ready);
      }

      this.logger.warn({ source: strategy.source, reason: result.reason }, 'Model source unavailable');
      failures.push({ source: strategy.source, reason: result.reason });
    }

    this.logger.error({ failures }, 'No model could be loaded, serving without a model');
    const unavailable: UnavailableState = {
      status: 'Unavailable',
      model: null,
      source: 'none',
      versionLabel: null,
      failures: Object.freeze(failures),
    };
    return Object.freeze(unavailable);
  }
}
