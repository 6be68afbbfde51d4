/**
 * PROMOTION MODULE
 */

export * from './promotion.types.js';
export { decide, PromotionGate } from './promotion.gate.js';
export type { PromotionGateDeps, PromotionContext } from './promotion.gate.js';
export { copyArtifactAtomic, readArtifact } from './artifact.store.js';
export { PromotionLock } from './promotion.lock.js';
export { executePromotionJob, runPromotionJob } from './promotion.job.js';
export type { PromotionJobContext } from './promotion.job.js';
