/**
 * Model Serving — Types
 */

import type { Classifier } from './model/classifier.types.js';

export type ServerStatus = 'Uninitialized' | 'Ready' | 'Unavailable';
export type ModelSource = 'registry' | 'local';

// ═══════════════════════════════════════════════════════════════
// ACQUISITION
// ═══════════════════════════════════════════════════════════════

export type AcquisitionResult =
  | { ok: true; model: Classifier; versionLabel: string }
  | { ok: false; reason: string };

export interface ModelAcquisitionStrategy {
  readonly source: ModelSource;
  acquire(): Promise<AcquisitionResult>;
}

export interface AcquisitionFailure {
  source: ModelSource;
  reason: string;
}

// ═══════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════

export interface UninitializedState {
  readonly status: 'Uninitialized';
  readonly model: null;
  readonly source: 'none';
  readonly versionLabel: null;
}

export interface ReadyState {
  readonly status: 'Ready';
  readonly model: Classifier;
  readonly source: ModelSource;
  readonly versionLabel: string;
  readonly loadedAt: string;
}

export interface UnavailableState {
  readonly status: 'Unavailable';
  readonly model: null;
  readonly source: 'none';
  readonly versionLabel: null;
  readonly failures: readonly AcquisitionFailure[];
}

export type ServerModelState = UninitializedState | ReadyState | UnavailableState;

/** What request handlers see: the result of initialization. */
export type InitializedState = ReadyState | UnavailableState;
