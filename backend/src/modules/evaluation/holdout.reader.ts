/**
 * Holdout CSV Reader
 * ==================
 * Header row, numeric feature columns, integer target column.
 */

import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { MetricsUnavailableError, errorMessage } from '../../common/errors.js';

export interface HoldoutSet {
  featureNames: string[];
  X: number[][];
  y: number[];
}

const RowsSchema = z.array(z.record(z.string()));

function toNumber(value: string | undefined, row: number, column: string): number {
  const n = value === undefined || value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new MetricsUnavailableError(`Holdout row ${row}: column "${column}" is not numeric`);
  }
  return n;
}

/**
 * @param featureNames column order expected by the model; defaults to every
 *   column except the target, in header order
 */
export function parseHoldout(text: string, targetColumn: string, featureNames?: readonly string[]): HoldoutSet {
  let rows: Array<Record<string, string>>;
  try {
    const records: unknown = parse(text, { columns: true, skip_empty_lines: true, trim: true });
    rows = RowsSchema.parse(records);
  } catch (err) {
    throw new MetricsUnavailableError(`Holdout data is not valid CSV: ${errorMessage(err)}`, err);
  }

  if (rows.length === 0) {
    throw new MetricsUnavailableError('Holdout data has no rows');
  }

  const header = Object.keys(rows[0]);
  if (!header.includes(targetColumn)) {
    throw new MetricsUnavailableError(`Holdout data has no target column "${targetColumn}"`);
  }

  const columns = featureNames ? [...featureNames] : header.filter((c) => c !== targetColumn);
  const missing = columns.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new MetricsUnavailableError(`Holdout data is missing feature columns: ${missing.join(', ')}`);
  }

  const X = rows.map((row, i) => columns.map((c) => toNumber(row[c], i + 1, c)));
  const y = rows.map((row, i) => {
    const label = toNumber(row[targetColumn], i + 1, targetColumn);
    if (!Number.isInteger(label)) {
      throw new MetricsUnavailableError(`Holdout row ${i + 1}: target "${row[targetColumn]}" is not a class label`);
    }
    return label;
  });

  return { featureNames: columns, X, y };
}

export async function readHoldout(
  filePath: string,
  targetColumn: string,
  featureNames?: readonly string[]
): Promise<HoldoutSet> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new MetricsUnavailableError(`Cannot read holdout data ${filePath}: ${errorMessage(err)}`, err);
  }
  return parseHoldout(text, targetColumn, featureNames);
}
