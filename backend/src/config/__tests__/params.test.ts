import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadParams, parseParams } from '../params.js';
import { ConfigError } from '../../common/errors.js';

describe('params file', () => {
  describe('parseParams', () => {
    it('should map every recognized key', () => {
      const params = parseParams({
        promote: {
          min_accuracy: 0.9,
          staging_model: 'models/staging/model.json',
          production_model: 'models/production/model.json',
        },
        registry: {
          tracking_uri: 'http://localhost:5000/',
          model_name: 'iris-classifier',
          version_selection: 'first',
          artifact_file: 'classifier.json',
        },
        evaluate: { holdout_data: 'data/holdout.csv', target_column: 'species' },
      });

      expect(params).toEqual({
        promote: {
          minAccuracy: 0.9,
          stagingModel: 'models/staging/model.json',
          productionModel: 'models/production/model.json',
        },
        registry: {
          trackingUri: 'http://localhost:5000',
          modelName: 'iris-classifier',
          versionSelection: 'first',
          artifactFile: 'classifier.json',
        },
        evaluate: { holdoutData: 'data/holdout.csv', targetColumn: 'species' },
      });
    });

    it('should apply defaults and leave optional sections null', () => {
      const params = parseParams({
        promote: { min_accuracy: 0.8, staging_model: 'a.json', production_model: 'b.json' },
        registry: { tracking_uri: 'http://registry:5000', model_name: 'm' },
      });

      expect(params.registry?.versionSelection).toBe('latest');
      expect(params.registry?.artifactFile).toBe('model.json');
      expect(params.evaluate).toBeNull();
    });

    it('should leave the registry null when the section is absent', () => {
      const params = parseParams({
        promote: { min_accuracy: 0.8, staging_model: 'a.json', production_model: 'b.json' },
      });

      expect(params.registry).toBeNull();
    });

    it('should reject a threshold outside [0, 1]', () => {
      expect(() =>
        parseParams({ promote: { min_accuracy: 1.5, staging_model: 'a', production_model: 'b' } })
      ).toThrow(/promote\.min_accuracy/);
    });

    it('should reject a missing promote section with ConfigError', () => {
      expect(() => parseParams({ registry: { tracking_uri: 'http://x', model_name: 'm' } })).toThrow(ConfigError);
    });

    it('should reject a registry section without a model name', () => {
      expect(() =>
        parseParams({
          promote: { min_accuracy: 0.5, staging_model: 'a', production_model: 'b' },
          registry: { tracking_uri: 'http://x' },
        })
      ).toThrow(/registry\.model_name/);
    });
  });

  describe('loadParams', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'params-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should read a JSON params file', async () => {
      const file = path.join(dir, 'params.json');
      await fs.writeFile(
        file,
        JSON.stringify({ promote: { min_accuracy: 0.9, staging_model: 's.json', production_model: 'p.json' } })
      );

      const params = await loadParams(file);
      expect(params.promote.minAccuracy).toBe(0.9);
    });

    it('should fail with ConfigError when the file is missing', async () => {
      await expect(loadParams(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
    });

    it('should fail with ConfigError on invalid JSON', async () => {
      const file = path.join(dir, 'params.json');
      await fs.writeFile(file, 'promote: {');

      await expect(loadParams(file)).rejects.toThrow(/is not valid JSON/);
    });
  });
});
