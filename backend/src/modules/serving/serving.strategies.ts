/**
 * Model Acquisition Strategies
 * ============================
 * Each strategy either returns a decoded model or a failure reason; none of
 * them throws. ModelServer tries them in priority order.
 */

import { createHash } from 'node:crypto';
import { errorMessage } from '../../common/errors.js';
import type { RegistrySync } from '../registry/registry.sync.js';
import { readArtifact } from '../promotion/artifact.store.js';
import { decodeClassifier } from './model/model.codec.js';
import type { AcquisitionResult, ModelAcquisitionStrategy } from './serving.types.js';

export class RegistryModelStrategy implements ModelAcquisitionStrategy {
  readonly source = 'registry' as const;

  constructor(
    private readonly registry: RegistrySync,
    private readonly modelName: string
  ) {}

  async acquire(): Promise<AcquisitionResult> {
    try {
      const { version, bytes } = await this.registry.fetchProduction(this.modelName);
      return { ok: true, model: decodeClassifier(bytes), versionLabel: `v${version.version}` };
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }
  }
}

export class LocalFileModelStrategy implements ModelAcquisitionStrategy {
  readonly source = 'local' as const;

  constructor(private readonly filePath: string) {}

  async acquire(): Promise<AcquisitionResult> {
    try {
      const bytes = await readArtifact(this.filePath);
      return { ok: true, model: decodeClassifier(bytes), versionLabel: contentLabel(bytes) };
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }
  }
}

/**
 * Version label of a local artifact: the first 12 hex chars of its SHA-256.
 */
export function contentLabel(bytes: Buffer): string {
  return `sha256:${createHash('sha256').update(bytes).digest('hex').slice(0, 12)}`;
}
