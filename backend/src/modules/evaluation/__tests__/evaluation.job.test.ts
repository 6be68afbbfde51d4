import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { EXIT_CODES } from '../../../common/errors.js';
import { RegistrySync } from '../../registry/registry.sync.js';
import type { RegistryClient } from '../../registry/registry.types.js';
import { executeEvaluationJob, runEvaluationJob, type EvaluationJobContext } from '../evaluation.job.js';

const STAGING_ARTIFACT = {
  format: 'classifier',
  kind: 'softmax',
  classes: [0, 1, 2],
  weights: [
    [1, 0],
    [0, 1],
    [-1, -1],
  ],
  bias: [0, 0, 0],
};

// predictions 0, 1, 2, 1 against targets 0, 1, 2, 0
const HOLDOUT = ['x1,x2,target', '2,0,0', '0,2,1', '-2,-2,2', '0,2,0'].join('\n');

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeClient() {
  const fail = async (): Promise<never> => {
    throw new Error('not used');
  };
  return {
    searchModelVersions: fail,
    transitionStage: fail,
    getDownloadUri: fail,
    downloadArtifact: fail,
    logMetrics: vi.fn(async (_runId: string, _metrics: Record<string, number>) => undefined),
  } satisfies RegistryClient;
}

describe('evaluation job', () => {
  let tmpDir: string;
  let ctx: EvaluationJobContext;
  let logger: ReturnType<typeof createLogger>;

  async function writeParams(params: object): Promise<void> {
    await fs.writeFile(ctx.paramsPath, JSON.stringify(params));
  }

  const baseParams = (dir: string) => ({
    promote: {
      min_accuracy: 0.9,
      staging_model: path.join(dir, 'staging', 'model.json'),
      production_model: path.join(dir, 'production', 'model.json'),
    },
    evaluate: { holdout_data: path.join(dir, 'holdout.csv') },
  });

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evaluate-'));
    await fs.mkdir(path.join(tmpDir, 'staging'));
    await fs.writeFile(path.join(tmpDir, 'staging', 'model.json'), JSON.stringify(STAGING_ARTIFACT));
    await fs.writeFile(path.join(tmpDir, 'holdout.csv'), HOLDOUT);
    logger = createLogger();
    ctx = {
      paramsPath: path.join(tmpDir, 'params.json'),
      evalMetricsPath: path.join(tmpDir, 'metrics', 'eval_metrics.json'),
      trainMetricsPath: path.join(tmpDir, 'metrics', 'train_metrics.json'),
      logger,
      createRegistry: () => null,
    };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should score the staging model and write the evaluation record', async () => {
    await writeParams(baseParams(tmpDir));

    const metrics = await executeEvaluationJob(ctx);

    expect(metrics.accuracy).toBe(0.75);
    const written = JSON.parse(await fs.readFile(ctx.evalMetricsPath, 'utf-8'));
    expect(written.accuracy).toBe(0.75);
    expect(written.confusion_matrix).toEqual([
      [1, 1, 0],
      [0, 1, 0],
      [0, 0, 1],
    ]);
    expect(Object.keys(written)).toEqual(['accuracy', 'precision', 'recall', 'f1_score', 'confusion_matrix']);
  });

  it('should attach metrics to the training run when the registry is configured', async () => {
    await writeParams({
      ...baseParams(tmpDir),
      registry: { tracking_uri: 'http://registry.test', model_name: 'iris' },
    });
    await fs.mkdir(path.dirname(ctx.trainMetricsPath), { recursive: true });
    await fs.writeFile(ctx.trainMetricsPath, JSON.stringify({ run_id: 'run-1' }));
    const client = fakeClient();
    ctx.createRegistry = (params) =>
      params ? new RegistrySync(client, { timeoutMs: 1000, artifactFile: params.artifactFile }) : null;

    await executeEvaluationJob(ctx);

    expect(client.logMetrics).toHaveBeenCalledTimes(1);
    expect(client.logMetrics.mock.calls[0][0]).toBe('run-1');
    expect(client.logMetrics.mock.calls[0][1]).toMatchObject({ eval_accuracy: 0.75 });
  });

  it('should only warn when the registry rejects the metrics', async () => {
    await writeParams({
      ...baseParams(tmpDir),
      registry: { tracking_uri: 'http://registry.test', model_name: 'iris' },
    });
    await fs.mkdir(path.dirname(ctx.trainMetricsPath), { recursive: true });
    await fs.writeFile(ctx.trainMetricsPath, JSON.stringify({ run_id: 'run-1' }));
    const client = fakeClient();
    client.logMetrics.mockRejectedValue(new Error('connect ECONNREFUSED'));
    ctx.createRegistry = () => new RegistrySync(client, { timeoutMs: 1000, artifactFile: 'model.json' });

    await expect(runEvaluationJob(ctx)).resolves.toBe(EXIT_CODES.OK);
    expect(logger.warn).toHaveBeenCalledWith(
      { runId: 'run-1', error: 'Registry logRunMetrics(run-1) failed: connect ECONNREFUSED' },
      'Could not attach metrics to training run'
    );
  });

  it('should exit 2 without an evaluate section', async () => {
    const { evaluate: _evaluate, ...params } = baseParams(tmpDir);
    await writeParams(params);

    await expect(runEvaluationJob(ctx)).resolves.toBe(EXIT_CODES.FATAL);
    expect(logger.error).toHaveBeenCalledWith(
      { code: 'CONFIG_ERROR', error: 'Params file has no "evaluate" section' },
      'Evaluation failed'
    );
  });

  it('should exit 2 when the holdout does not match the model', async () => {
    await writeParams(baseParams(tmpDir));
    await fs.writeFile(path.join(tmpDir, 'holdout.csv'), 'x1,target\n1,0\n');

    await expect(runEvaluationJob(ctx)).resolves.toBe(EXIT_CODES.FATAL);
    expect(logger.error).toHaveBeenCalledWith(
      { code: 'CONFIG_ERROR', error: 'Holdout has 1 feature columns, model expects 2' },
      'Evaluation failed'
    );
  });

  it('should exit 2 when the staging artifact is missing', async () => {
    await writeParams(baseParams(tmpDir));
    await fs.rm(path.join(tmpDir, 'staging', 'model.json'));

    await expect(runEvaluationJob(ctx)).resolves.toBe(EXIT_CODES.FATAL);
  });
});
