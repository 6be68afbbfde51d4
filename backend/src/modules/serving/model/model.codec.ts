/**
 * Classifier Artifact Codec
 * =========================
 * A model artifact is a JSON document:
 *
 *   { "format": "classifier", "kind": "softmax", "classes": [0, 1, 2],
 *     "weights": [[...], [...], [...]], "bias": [...],
 *     "featureNames": [...], "scaler": { "mean": [...], "std": [...] } }
 *
 * `kind: "logistic"` carries a flat `weights` vector, a scalar `bias` and
 * exactly two classes.
 */

import { z } from 'zod';
import { ModelLoadFailureError, errorMessage } from '../../../common/errors.js';
import type { Classifier, ClassifierMeta } from './classifier.types.js';
import { LogisticRegression } from './logreg.model.js';
import { SoftmaxClassifier } from './softmax.model.js';

const finite = z.number().finite();

const Common = {
  format: z.literal('classifier'),
  classes: z.array(z.number().int()).min(2),
  featureNames: z.array(z.string()).optional(),
  scaler: z.object({ mean: z.array(finite), std: z.array(finite) }).optional(),
};

const ArtifactSchema = z.discriminatedUnion('kind', [
  z.object({
    ...Common,
    kind: z.literal('softmax'),
    weights: z.array(z.array(finite).min(1)).min(2),
    bias: z.array(finite),
  }),
  z.object({
    ...Common,
    kind: z.literal('logistic'),
    weights: z.array(finite).min(1),
    bias: finite,
  }),
]);

type Artifact = z.infer<typeof ArtifactSchema>;

function check(condition: boolean, message: string): void {
  if (!condition) throw new ModelLoadFailureError(`Invalid model artifact: ${message}`);
}

function checkMeta(artifact: Artifact, nFeatures: number): ClassifierMeta {
  check(new Set(artifact.classes).size === artifact.classes.length, 'classes must be unique');
  if (artifact.featureNames) {
    check(artifact.featureNames.length === nFeatures, `featureNames must have ${nFeatures} entries`);
  }
  if (artifact.scaler) {
    check(
      artifact.scaler.mean.length === nFeatures && artifact.scaler.std.length === nFeatures,
      `scaler must have ${nFeatures} entries`
    );
  }
  return {
    classes: artifact.classes,
    featureNames: artifact.featureNames ?? null,
    scaler: artifact.scaler ?? null,
  };
}

export function decodeClassifier(bytes: Buffer | string): Classifier {
  let raw: unknown;
  try {
    raw = JSON.parse(typeof bytes === 'string' ? bytes : bytes.toString('utf-8'));
  } catch (err) {
    throw new ModelLoadFailureError(`Model artifact is not valid JSON: ${errorMessage(err)}`, err);
  }

  const parsed = ArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ModelLoadFailureError(`Invalid model artifact: ${issues}`);
  }

  const artifact = parsed.data;

  if (artifact.kind === 'softmax') {
    const nFeatures = artifact.weights[0].length;
    check(artifact.weights.length === artifact.classes.length, 'weights must have one row per class');
    check(artifact.weights.every((row) => row.length === nFeatures), 'weight rows must have equal length');
    check(artifact.bias.length === artifact.classes.length, 'bias must have one entry per class');
    return new SoftmaxClassifier(
      { weights: artifact.weights, bias: artifact.bias },
      checkMeta(artifact, nFeatures)
    );
  }

  check(artifact.classes.length === 2, 'logistic models have exactly two classes');
  return new LogisticRegression(
    { weights: artifact.weights, bias: artifact.bias },
    checkMeta(artifact, artifact.weights.length)
  );
}
