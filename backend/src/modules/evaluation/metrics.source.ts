/**
 * MetricsSource
 * =============
 * Reads the evaluation record (required by promotion) and the training record
 * (optional, carries the registry run id), and writes evaluation records.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { MetricsUnavailableError, errorMessage } from '../../common/errors.js';
import type { EvaluationMetrics, TrainingRecord } from './evaluation.types.js';

const rate = z.number().min(0).max(1);

const EvalMetricsFileSchema = z.object({
  accuracy: rate,
  precision: rate.nullish(),
  recall: rate.nullish(),
  f1: rate.nullish(),
  f1_score: rate.nullish(),
  confusion_matrix: z.array(z.array(z.number())).nullish(),
});

const TrainMetricsFileSchema = z.object({
  run_id: z.string().min(1).optional(),
  mlflow_run_id: z.string().min(1).optional(),
});

async function readJson(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(text);
}

export async function loadEvaluationMetrics(filePath: string): Promise<EvaluationMetrics> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (err) {
    throw new MetricsUnavailableError(`Evaluation metrics unavailable at ${filePath}: ${errorMessage(err)}`, err);
  }

  const parsed = EvalMetricsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new MetricsUnavailableError(`Malformed evaluation metrics at ${filePath}: ${issues}`);
  }

  const m = parsed.data;
  return Object.freeze({
    accuracy: m.accuracy,
    precision: m.precision ?? null,
    recall: m.recall ?? null,
    f1: m.f1 ?? m.f1_score ?? null,
    confusionMatrix: m.confusion_matrix ?? null,
  });
}

/**
 * Missing file → null. A file that exists but cannot be parsed is an error.
 */
export async function loadTrainingRecord(filePath: string): Promise<TrainingRecord | null> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new MetricsUnavailableError(`Training record unreadable at ${filePath}: ${errorMessage(err)}`, err);
  }

  const parsed = TrainMetricsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MetricsUnavailableError(`Malformed training record at ${filePath}`);
  }
  return Object.freeze({ runId: parsed.data.run_id ?? parsed.data.mlflow_run_id ?? null });
}

export async function writeEvaluationMetrics(filePath: string, metrics: EvaluationMetrics): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const record = {
    accuracy: metrics.accuracy,
    precision: metrics.precision,
    recall: metrics.recall,
    f1_score: metrics.f1,
    confusion_matrix: metrics.confusionMatrix,
  };
  await fs.writeFile(filePath, JSON.stringify(record, null, 2) + '\n', 'utf-8');
}

/**
 * Flat numeric view for the registry's run metrics.
 */
export function toRunMetrics(metrics: EvaluationMetrics): Record<string, number> {
  const out: Record<string, number> = { eval_accuracy: metrics.accuracy };
  if (metrics.precision !== null) out.eval_precision = metrics.precision;
  if (metrics.recall !== null) out.eval_recall = metrics.recall;
  if (metrics.f1 !== null) out.eval_f1_score = metrics.f1;
  return out;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
