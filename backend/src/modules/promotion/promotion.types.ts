/**
 * Promotion — Types
 */

import type { RegistryModelVersion } from '../registry/registry.types.js';

export type PromotionOutcome = 'promoted' | 'rejected';

/**
 * Result of the threshold gate. Not persisted; surfaced through logs and the
 * job's exit code.
 */
export interface PromotionDecision {
  accuracy: number;
  threshold: number;
  outcome: PromotionOutcome;
}

export type RegistrySyncOutcome =
  | { status: 'promoted'; version: RegistryModelVersion }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface PromotionResult {
  decision: PromotionDecision;
  /** Absent when the gate rejected and nothing was touched. */
  localCopy: { destination: string; bytes: number } | null;
  registry: RegistrySyncOutcome | null;
}
