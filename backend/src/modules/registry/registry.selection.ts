/**
 * Version Selection
 * =================
 * The registry does not promise any ordering of a model's versions, so the
 * promotion target is chosen by an explicit rule instead of "first element".
 */

import type { VersionSelectionPolicy } from '../../config/params.js';
import type { RegistryModelVersion } from './registry.types.js';

export interface SelectionOptions {
  /** Run that produced the staging artifact, when the training record has one. */
  runId?: string | null;
  policy: VersionSelectionPolicy;
}

function versionNumber(v: RegistryModelVersion): number {
  const n = Number(v.version);
  return Number.isFinite(n) ? n : Number.NEGATIVE_INFINITY;
}

/**
 * Highest numeric version first; ties (or non-numeric versions) by creation time.
 */
export function compareVersionsDesc(a: RegistryModelVersion, b: RegistryModelVersion): number {
  const byNumber = versionNumber(b) - versionNumber(a);
  if (byNumber !== 0 && !Number.isNaN(byNumber)) return byNumber;
  return (b.createdAt ?? 0) - (a.createdAt ?? 0);
}

export function selectPromotionTarget(
  versions: RegistryModelVersion[],
  options: SelectionOptions
): RegistryModelVersion | null {
  const candidates = versions.filter((v) => v.stage !== 'Archived');
  if (candidates.length === 0) return null;

  if (options.runId) {
    const fromRun = candidates.filter((v) => v.runId === options.runId).sort(compareVersionsDesc);
    if (fromRun.length > 0) return fromRun[0];
  }

  if (options.policy === 'first') {
    return candidates[0];
  }

  return [...candidates].sort(compareVersionsDesc)[0];
}

/**
 * Versions currently holding Production, newest first. More than one entry
 * means the registry broke its own single-holder rule.
 */
export function productionHolders(versions: RegistryModelVersion[]): RegistryModelVersion[] {
  return versions.filter((v) => v.stage === 'Production').sort(compareVersionsDesc);
}
