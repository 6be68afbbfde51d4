/**
 * Model Registry — Types
 */

// ═══════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════

export const REGISTRY_STAGES = ['None', 'Staging', 'Production', 'Archived'] as const;

export type RegistryStage = (typeof REGISTRY_STAGES)[number];

/**
 * A version as the registry reports it. Owned by the registry: this service
 * observes versions and requests transitions, it never creates them.
 */
export interface RegistryModelVersion {
  name: string;
  version: string;
  stage: RegistryStage;
  runId: string | null;
  createdAt: number | null;
  source: string | null;
}

export interface ProductionArtifact {
  version: RegistryModelVersion;
  bytes: Buffer;
}

// ═══════════════════════════════════════════════════════════════
// CLIENT CONTRACT
// ═══════════════════════════════════════════════════════════════

/**
 * Raw registry operations. Implementations throw on any failure; mapping to
 * RegistryUnavailableError happens in RegistrySync. `signal` cancels the
 * request when RegistrySync's deadline passes.
 */
export interface RegistryClient {
  searchModelVersions(name: string, signal?: AbortSignal): Promise<RegistryModelVersion[]>;
  transitionStage(
    name: string,
    version: string,
    stage: RegistryStage,
    archiveExisting: boolean,
    signal?: AbortSignal
  ): Promise<RegistryModelVersion>;
  getDownloadUri(name: string, version: string, signal?: AbortSignal): Promise<string>;
  downloadArtifact(artifactUri: string, file: string, signal?: AbortSignal): Promise<Buffer>;
  logMetrics(runId: string, metrics: Record<string, number>, signal?: AbortSignal): Promise<void>;
}
