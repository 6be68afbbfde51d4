/**
 * RegistrySync
 * ============
 * Registry operations used by the promotion job and the model server.
 *
 * - Every call runs under a deadline; the pending request is aborted when it
 *   passes. A transition that reached the registry before the abort may still
 *   have been applied; the cause of such a failure is a TimeoutError.
 * - Every failure surfaces as RegistryUnavailableError; nothing is retried here.
 */

import { RegistryEntryMissingError, RegistryUnavailableError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { withTimeout } from '../../common/timeout.js';
import { describeRegistryError } from '../../clients/mlflow.client.js';
import { productionHolders, selectPromotionTarget, type SelectionOptions } from './registry.selection.js';
import type {
  ProductionArtifact,
  RegistryClient,
  RegistryModelVersion,
  RegistryStage,
} from './registry.types.js';

export interface RegistrySyncOptions {
  timeoutMs: number;
  artifactFile: string;
  logger?: Logger;
}

export class RegistrySync {
  constructor(
    private readonly client: RegistryClient,
    private readonly options: RegistrySyncOptions
  ) {}

  async listVersions(name: string): Promise<RegistryModelVersion[]> {
    return this.call(`listVersions(${name})`, (signal) => this.client.searchModelVersions(name, signal));
  }

  /**
   * Black-box stage transition. With `archiveExisting` the registry archives
   * every other holder of `stage` in the same call.
   */
  async transition(
    name: string,
    version: string,
    stage: RegistryStage,
    archiveExisting: boolean
  ): Promise<RegistryModelVersion> {
    return this.call(`transition(${name} v${version} -> ${stage})`, (signal) =>
      this.client.transitionStage(name, version, stage, archiveExisting, signal)
    );
  }

  /**
   * Select the version that corresponds to the promoted artifact and move it
   * to Production, archiving the previous holder.
   */
  async promoteToProduction(name: string, selection: SelectionOptions): Promise<RegistryModelVersion> {
    const versions = await this.listVersions(name);
    const target = selectPromotionTarget(versions, selection);
    if (!target) {
      throw new RegistryEntryMissingError(`No promotable version registered for model ${name}`);
    }

    this.options.logger?.info(
      { model: name, version: target.version, runId: target.runId, policy: selection.policy },
      'Transitioning registry version to Production'
    );

    return this.transition(name, target.version, 'Production', true);
  }

  /**
   * The Production version of `name` and its artifact bytes.
   */
  async fetchProduction(name: string): Promise<ProductionArtifact> {
    return this.call(`fetchProduction(${name})`, async (signal) => {
      const holders = productionHolders(await this.client.searchModelVersions(name, signal));
      if (holders.length === 0) {
        throw new RegistryEntryMissingError(`Model ${name} has no Production version`);
      }
      if (holders.length > 1) {
        this.options.logger?.warn(
          { model: name, versions: holders.map((v) => v.version) },
          'Registry reports several Production versions, using the highest'
        );
      }

      const version = holders[0];
      const uri = await this.client.getDownloadUri(name, version.version, signal);
      const bytes = await this.client.downloadArtifact(uri, this.options.artifactFile, signal);
      return { version, bytes };
    });
  }

  async logRunMetrics(runId: string, metrics: Record<string, number>): Promise<void> {
    await this.call(`logRunMetrics(${runId})`, (signal) => this.client.logMetrics(runId, metrics, signal));
  }

  private async call<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn, this.options.timeoutMs, `registry ${label}`);
    } catch (err) {
      if (err instanceof RegistryUnavailableError) throw err;
      throw new RegistryUnavailableError(`Registry ${label} failed: ${describeRegistryError(err)}`, err);
    }
  }
}
