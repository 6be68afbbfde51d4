import type { FastifyInstance } from 'fastify';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { buildApp } from '../../../app.js';
import { decodeClassifier } from '../model/model.codec.js';
import type { Classifier } from '../model/classifier.types.js';
import type { ReadyState, UnavailableState } from '../serving.types.js';

const MODEL = decodeClassifier(
  JSON.stringify({
    format: 'classifier',
    kind: 'softmax',
    classes: [0, 1, 2],
    featureNames: ['petal_length', 'petal_width'],
    weights: [
      [1, 0],
      [0, 1],
      [-1, -1],
    ],
    bias: [0, 0, 0],
  })
);

function ready(model: Classifier = MODEL): ReadyState {
  const state: ReadyState = {
    status: 'Ready',
    model,
    source: 'local',
    versionLabel: 'sha256:0123456789ab',
    loadedAt: '2026-01-01T00:00:00.000Z',
  };
  return Object.freeze(state);
}

const UNAVAILABLE: UnavailableState = {
  status: 'Unavailable',
  model: null,
  source: 'none',
  versionLabel: null,
  failures: [{ source: 'local', reason: 'Model artifact not found: models/production/model.json' }],
};

function spyModel(overrides: Partial<Pick<Classifier, 'predictProba' | 'predict'>> = {}) {
  const predictProba = vi.fn(overrides.predictProba ?? ((x: readonly number[]) => MODEL.predictProba(x)));
  const predict = vi.fn(overrides.predict ?? ((x: readonly number[]) => MODEL.predict(x)));
  const labelFor = vi.fn((probability: readonly number[]) => MODEL.labelFor(probability));
  const model: Classifier = {
    kind: 'softmax',
    classes: MODEL.classes,
    nFeatures: 2,
    featureNames: null,
    predictProba,
    predict,
    labelFor,
  };
  return { model, predictProba, predict, labelFor };
}

describe('serving routes', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  describe('with a model', () => {
    it('GET / should describe the service', async () => {
      app = buildApp({ state: ready(), logger: false });

      const res = await app.inject({ method: 'GET', url: '/' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        message: 'Model Serving API',
        status: 'running',
        model_loaded: true,
        source: 'local',
        version: 'sha256:0123456789ab',
      });
    });

    it('GET /health should report the loaded model', async () => {
      app = buildApp({ state: ready(), logger: false });

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'healthy',
        model_loaded: true,
        source: 'local',
        version: 'sha256:0123456789ab',
      });
    });

    it('GET /model-info should return metadata', async () => {
      app = buildApp({ state: ready(), logger: false });

      const res = await app.inject({ method: 'GET', url: '/model-info' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        source: 'local',
        version: 'sha256:0123456789ab',
        kind: 'softmax',
        n_features: 2,
        classes: [0, 1, 2],
        feature_names: ['petal_length', 'petal_width'],
        loaded_at: '2026-01-01T00:00:00.000Z',
      });
    });

    it('POST /predict should return the label and probabilities', async () => {
      app = buildApp({ state: ready(), logger: false });

      const res = await app.inject({ method: 'POST', url: '/predict', payload: { features: [2, 0] } });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.prediction).toBe(0);
      expect(body.model_version).toBe('sha256:0123456789ab');
      expect(body.model_source).toBe('local');
      expect(body.probability).toHaveLength(3);
      expect(body.probability[0]).toBeCloseTo(0.8668, 4);
    });

    it('POST /predict should run the model once per request', async () => {
      const spy = spyModel();
      app = buildApp({ state: ready(spy.model), logger: false });

      const res = await app.inject({ method: 'POST', url: '/predict', payload: { features: [0, 3] } });

      expect(res.statusCode).toBe(200);
      expect(res.json().prediction).toBe(1);
      expect(spy.predictProba).toHaveBeenCalledTimes(1);
      expect(spy.predict).not.toHaveBeenCalled();
      expect(spy.labelFor).toHaveBeenCalledWith(res.json().probability);
    });

    it('POST /predict should reject a dimension mismatch without calling the model', async () => {
      const spy = spyModel();
      const state = ready(spy.model);
      app = buildApp({ state, logger: false });

      const res = await app.inject({ method: 'POST', url: '/predict', payload: { features: [1, 2, 3] } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'PREDICTION_INPUT_ERROR',
        message: 'Expected 2 features, got 3',
      });
      expect(spy.predictProba).not.toHaveBeenCalled();
      expect(spy.predict).not.toHaveBeenCalled();

      const next = await app.inject({ method: 'POST', url: '/predict', payload: { features: [0, 3] } });
      expect(next.statusCode).toBe(200);
      expect(next.json().prediction).toBe(1);
    });

    it('POST /predict should reject a body without a feature array', async () => {
      app = buildApp({ state: ready(), logger: false });

      for (const payload of [{ x: [1, 2] }, { features: ['a', 'b'] }, { features: 3 }]) {
        const res = await app.inject({ method: 'POST', url: '/predict', payload });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({
          ok: false,
          error: 'PREDICTION_INPUT_ERROR',
          message: 'Request body must be {"features": [numbers]}',
        });
      }
    });

    it('POST /predict should map model failures to PREDICTION_ERROR', async () => {
      const spy = spyModel({
        predictProba: () => {
          throw new Error('matrix is singular');
        },
      });
      app = buildApp({ state: ready(spy.model), logger: false });

      const res = await app.inject({ method: 'POST', url: '/predict', payload: { features: [1, 1] } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'PREDICTION_ERROR',
        message: 'Prediction error: matrix is singular',
      });

      const health = await app.inject({ method: 'GET', url: '/health' });
      expect(health.statusCode).toBe(200);
    });
  });

  describe('without a model', () => {
    it('GET /health should still answer', async () => {
      app = buildApp({ state: UNAVAILABLE, logger: false });

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'healthy', model_loaded: false, source: 'none', version: null });
    });

    it('GET /model-info should be 503', async () => {
      app = buildApp({ state: UNAVAILABLE, logger: false });

      const res = await app.inject({ method: 'GET', url: '/model-info' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ ok: false, error: 'MODEL_NOT_LOADED', message: 'Model not loaded' });
    });

    it('POST /predict should be 503 whatever the input', async () => {
      app = buildApp({ state: UNAVAILABLE, logger: false });

      const valid = await app.inject({ method: 'POST', url: '/predict', payload: { features: [1, 2] } });
      const invalid = await app.inject({
        method: 'POST',
        url: '/predict',
        headers: { 'content-type': 'application/json' },
        payload: '{not json',
      });

      for (const res of [valid, invalid]) {
        expect(res.statusCode).toBe(503);
        expect(res.json()).toEqual({ ok: false, error: 'MODEL_NOT_LOADED', message: 'Model not loaded' });
      }
    });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    app = buildApp({ state: ready(), logger: false });

    const res = await app.inject({ method: 'GET', url: '/models' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
