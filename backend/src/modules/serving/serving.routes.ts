/**
 * Model Serving Routes
 * ====================
 * GET  /            service banner + model status
 * GET  /health      liveness, never fails
 * GET  /model-info  metadata of the loaded model (503 without one)
 * POST /predict     class label + probabilities (503 without a model)
 *
 * Handlers only read `state`; nothing here mutates it.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  ModelNotLoadedError,
  PredictionInputError,
  PredictionInternalError,
  errorMessage,
} from '../../common/errors.js';
import type { InitializedState } from './serving.types.js';

const PredictBody = z.object({
  features: z.array(z.number().finite()),
});

export interface PredictResponse {
  prediction: number;
  probability: number[];
  model_version: string;
  model_source: string;
}

export async function registerServingRoutes(app: FastifyInstance, state: InitializedState): Promise<void> {
  const modelLoaded = state.status === 'Ready';

  // ═══════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════

  app.get('/', async () => ({
    message: 'Model Serving API',
    status: 'running',
    model_loaded: modelLoaded,
    source: state.source,
    version: state.versionLabel,
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    model_loaded: modelLoaded,
    source: state.source,
    version: state.versionLabel,
  }));

  app.get('/model-info', async () => {
    if (state.status !== 'Ready') {
      throw new ModelNotLoadedError();
    }
    const { model } = state;
    return {
      source: state.source,
      version: state.versionLabel,
      kind: model.kind,
      n_features: model.nFeatures,
      classes: model.classes,
      feature_names: model.featureNames,
      loaded_at: state.loadedAt,
    };
  });

  // ═══════════════════════════════════════════════════════════════
  // PREDICT
  // ═══════════════════════════════════════════════════════════════

  app.post(
    '/predict',
    {
      // Runs before body parsing: without a model every request is a 503.
      onRequest: async () => {
        if (state.status !== 'Ready') throw new ModelNotLoadedError();
      },
    },
    async (request): Promise<PredictResponse> => {
      if (state.status !== 'Ready') {
        throw new ModelNotLoadedError();
      }

      const body = PredictBody.safeParse(request.body);
      if (!body.success) {
        throw new PredictionInputError('Request body must be {"features": [numbers]}');
      }

      const { features } = body.data;
      const { model } = state;
      if (features.length !== model.nFeatures) {
        throw new PredictionInputError(`Expected ${model.nFeatures} features, got ${features.length}`);
      }

      try {
        const probability = model.predictProba(features);
        const prediction = model.labelFor(probability);
        return {
          prediction,
          probability,
          model_version: state.versionLabel,
          model_source: state.source,
        };
      } catch (err) {
        request.log.error({ error: errorMessage(err) }, 'Model invocation failed');
        throw new PredictionInternalError(err);
      }
    }
  );
}
