/**
 * Application Errors
 * ==================
 * Every failure the promotion pipeline or the serving layer knows about is an
 * AppError. `statusCode` is used by the HTTP error handler, `exitCode` by the
 * command-line jobs.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly exitCode: number;

  constructor(
    message: string,
    options: { statusCode?: number; code?: string; exitCode?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.exitCode = options.exitCode ?? EXIT_CODES.FATAL;
  }
}

// ═══════════════════════════════════════════════════════════════
// EXIT CODES
// ═══════════════════════════════════════════════════════════════

export const EXIT_CODES = {
  OK: 0,
  THRESHOLD_NOT_MET: 1,
  FATAL: 2,
  LOCKED: 3,
} as const;

// ═══════════════════════════════════════════════════════════════
// PIPELINE (fatal)
// ═══════════════════════════════════════════════════════════════

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'CONFIG_ERROR', cause });
  }
}

export class MetricsUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: 'METRICS_UNAVAILABLE', cause });
  }
}

export class ArtifactMissingError extends AppError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Model artifact not found: ${path}`, { code: 'ARTIFACT_MISSING', cause });
  }
}

export class ThresholdNotMetError extends AppError {
  constructor(readonly accuracy: number, readonly threshold: number) {
    super(
      `Model accuracy ${accuracy.toFixed(4)} is below threshold ${threshold.toFixed(4)}`,
      { code: 'THRESHOLD_NOT_MET', exitCode: EXIT_CODES.THRESHOLD_NOT_MET }
    );
  }
}

export class PromotionInProgressError extends AppError {
  constructor(readonly lockPath: string) {
    super(`Another promotion holds the lock at ${lockPath}`, {
      statusCode: 409,
      code: 'PROMOTION_IN_PROGRESS',
      exitCode: EXIT_CODES.LOCKED,
    });
  }
}

// ═══════════════════════════════════════════════════════════════
// REGISTRY (recoverable)
// ═══════════════════════════════════════════════════════════════

export class RegistryUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 503, code: 'REGISTRY_UNAVAILABLE', cause });
  }
}

export class RegistryEntryMissingError extends RegistryUnavailableError {}

// ═══════════════════════════════════════════════════════════════
// SERVING
// ═══════════════════════════════════════════════════════════════

export class ModelLoadFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 503, code: 'MODEL_LOAD_FAILURE', cause });
  }
}

export class ModelNotLoadedError extends AppError {
  constructor() {
    super('Model not loaded', { statusCode: 503, code: 'MODEL_NOT_LOADED' });
  }
}

export class PredictionInputError extends AppError {
  constructor(message: string) {
    super(message, { statusCode: 400, code: 'PREDICTION_INPUT_ERROR' });
  }
}

export class PredictionInternalError extends AppError {
  constructor(cause: unknown) {
    super(`Prediction error: ${errorMessage(cause)}`, {
      statusCode: 400,
      code: 'PREDICTION_ERROR',
      cause,
    });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
