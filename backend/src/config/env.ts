/**
 * Environment Configuration
 * =========================
 * Process-level settings. Model parameters live in the params file
 * (see params.ts), not here.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // HTTP
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CORS_ORIGINS: z.string().default('*'),

  // Files
  PARAMS_PATH: z.string().default('params.json'),
  EVAL_METRICS_PATH: z.string().default('metrics/eval_metrics.json'),
  TRAIN_METRICS_PATH: z.string().default('metrics/train_metrics.json'),

  // Registry
  REGISTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  REGISTRY_PROXY_URL: z.string().url().optional(),

  // Promotion
  PROMOTION_LOCK_STALE_MS: z.coerce.number().int().positive().default(300_000),

  // Serving
  SERVE_REQUIRE_MODEL: booleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

function loadEnv(): Env {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
