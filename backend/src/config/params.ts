/**
 * Params File (ParamSource)
 * =========================
 * Loads and validates the pipeline parameter file. Keys follow the file's
 * snake_case layout; the parsed object is camelCase.
 *
 * @example
 * {
 *   "promote": {
 *     "min_accuracy": 0.9,
 *     "staging_model": "models/staging/model.json",
 *     "production_model": "models/production/model.json"
 *   },
 *   "registry": { "tracking_uri": "http://localhost:5000", "model_name": "iris-classifier" }
 * }
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const PromoteSchema = z.object({
  min_accuracy: z.number().min(0).max(1),
  staging_model: z.string().min(1),
  production_model: z.string().min(1),
});

const RegistrySchema = z.object({
  tracking_uri: z.string().url(),
  model_name: z.string().min(1),
  version_selection: z.enum(['latest', 'first']).default('latest'),
  artifact_file: z.string().min(1).default('model.json'),
});

const EvaluateSchema = z.object({
  holdout_data: z.string().min(1),
  target_column: z.string().min(1).default('target'),
});

const ParamsFileSchema = z.object({
  promote: PromoteSchema,
  registry: RegistrySchema.optional(),
  evaluate: EvaluateSchema.optional(),
});

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type VersionSelectionPolicy = z.infer<typeof RegistrySchema>['version_selection'];

export interface PromotionParams {
  minAccuracy: number;
  stagingModel: string;
  productionModel: string;
}

export interface RegistryParams {
  trackingUri: string;
  modelName: string;
  versionSelection: VersionSelectionPolicy;
  artifactFile: string;
}

export interface EvaluateParams {
  holdoutData: string;
  targetColumn: string;
}

export interface Params {
  promote: PromotionParams;
  registry: RegistryParams | null;
  evaluate: EvaluateParams | null;
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

export function parseParams(raw: unknown): Params {
  const parsed = ParamsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid params: ${issues}`);
  }

  const { promote, registry, evaluate } = parsed.data;
  return {
    promote: {
      minAccuracy: promote.min_accuracy,
      stagingModel: promote.staging_model,
      productionModel: promote.production_model,
    },
    registry: registry
      ? {
          trackingUri: registry.tracking_uri.replace(/\/+$/, ''),
          modelName: registry.model_name,
          versionSelection: registry.version_selection,
          artifactFile: registry.artifact_file,
        }
      : null,
    evaluate: evaluate
      ? { holdoutData: evaluate.holdout_data, targetColumn: evaluate.target_column }
      : null,
  };
}

export async function loadParams(filePath: string): Promise<Params> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read params file ${filePath}: ${errorMessage(err)}`, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Params file ${filePath} is not valid JSON: ${errorMessage(err)}`, err);
  }

  return parseParams(raw);
}
