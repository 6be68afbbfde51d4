/**
 * MLflow Model Registry HTTP Client
 *
 * ═══════════════════════════════════════════════════════════════
 * Thin REST wrapper over the MLflow 2.0 registry API.
 * ═══════════════════════════════════════════════════════════════
 *
 * Every method throws on failure (HTTP error, timeout, unexpected payload).
 * Degradation policy lives in RegistrySync, not here.
 *
 * @example
 * const client = new MlflowRegistryClient({ trackingUri: 'http://localhost:5000', timeoutMs: 5000 });
 * const versions = await client.searchModelVersions('iris-classifier');
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient } from './http.factory.js';
import {
  REGISTRY_STAGES,
  type RegistryClient,
  type RegistryModelVersion,
  type RegistryStage,
} from '../modules/registry/registry.types.js';

// ============================================
// WIRE TYPES
// ============================================

const WireModelVersion = z.object({
  name: z.string(),
  version: z.union([z.string(), z.number()]).transform(String),
  current_stage: z.enum(REGISTRY_STAGES).catch('None'),
  run_id: z.string().optional(),
  creation_timestamp: z.union([z.number(), z.string()]).optional(),
  source: z.string().optional(),
});

const SearchResponse = z.object({
  model_versions: z.array(WireModelVersion).default([]),
  next_page_token: z.string().optional(),
});

const TransitionResponse = z.object({
  model_version: WireModelVersion,
});

const DownloadUriResponse = z.object({
  artifact_uri: z.string().min(1),
});

type WireModelVersion = z.infer<typeof WireModelVersion>;

function toModelVersion(wire: WireModelVersion): RegistryModelVersion {
  const created = wire.creation_timestamp !== undefined ? Number(wire.creation_timestamp) : NaN;
  return {
    name: wire.name,
    version: wire.version,
    stage: wire.current_stage,
    runId: wire.run_id || null,
    createdAt: Number.isFinite(created) ? created : null,
    source: wire.source ?? null,
  };
}

// ============================================
// CLIENT CONFIGURATION
// ============================================

export interface MlflowClientConfig {
  trackingUri: string;
  timeoutMs: number;
  proxyUrl?: string;
  pageSize?: number;
}

const API = '/api/2.0/mlflow';
const ARTIFACTS_API = '/api/2.0/mlflow-artifacts/artifacts';
const DEFAULT_PAGE_SIZE = 200;

// ============================================
// MLFLOW CLIENT
// ============================================

export class MlflowRegistryClient implements RegistryClient {
  private client: AxiosInstance;
  private config: MlflowClientConfig;

  constructor(config: MlflowClientConfig, client?: AxiosInstance) {
    this.config = config;
    this.client =
      client ??
      createHttpClient({
        baseURL: config.trackingUri,
        timeout: config.timeoutMs,
        proxyUrl: config.proxyUrl,
      });
  }

  // ============================================
  // MODEL VERSIONS
  // ============================================

  /**
   * All versions of a registered model, in the order the registry returns them.
   */
  async searchModelVersions(name: string, signal?: AbortSignal): Promise<RegistryModelVersion[]> {
    const versions: RegistryModelVersion[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.client.get(`${API}/model-versions/search`, {
        params: {
          filter: `name='${name.replace(/'/g, "\\'")}'`,
          max_results: this.config.pageSize ?? DEFAULT_PAGE_SIZE,
          ...(pageToken ? { page_token: pageToken } : {}),
        },
        signal,
      });
      const page = SearchResponse.parse(response.data);
      versions.push(...page.model_versions.map(toModelVersion));
      pageToken = page.next_page_token || undefined;
    } while (pageToken);

    return versions;
  }

  async transitionStage(
    name: string,
    version: string,
    stage: RegistryStage,
    archiveExisting: boolean,
    signal?: AbortSignal
  ): Promise<RegistryModelVersion> {
    const response = await this.client.post(
      `${API}/model-versions/transition-stage`,
      { name, version, stage, archive_existing_versions: archiveExisting },
      { signal }
    );
    return toModelVersion(TransitionResponse.parse(response.data).model_version);
  }

  // ============================================
  // ARTIFACTS
  // ============================================

  async getDownloadUri(name: string, version: string, signal?: AbortSignal): Promise<string> {
    const response = await this.client.get(`${API}/model-versions/get-download-uri`, {
      params: { name, version },
      signal,
    });
    return DownloadUriResponse.parse(response.data).artifact_uri;
  }

  /**
   * Download one file of a model version's artifact directory.
   * Supports `mlflow-artifacts:` (proxied through the tracking server) and
   * plain http(s) artifact roots.
   */
  async downloadArtifact(artifactUri: string, file: string, signal?: AbortSignal): Promise<Buffer> {
    const url = resolveArtifactUrl(artifactUri, file);
    const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer', signal });
    return Buffer.from(response.data);
  }

  // ============================================
  // RUNS
  // ============================================

  async logMetrics(runId: string, metrics: Record<string, number>, signal?: AbortSignal): Promise<void> {
    const timestamp = Date.now();
    await this.client.post(
      `${API}/runs/log-batch`,
      {
        run_id: runId,
        metrics: Object.entries(metrics).map(([key, value]) => ({ key, value, timestamp, step: 0 })),
      },
      { signal }
    );
  }
}

// ============================================
// HELPERS
// ============================================

export function resolveArtifactUrl(artifactUri: string, file: string): string {
  const fileName = file.replace(/^\/+/, '');

  if (artifactUri.startsWith('mlflow-artifacts:')) {
    const artifactPath = artifactUri
      .replace(/^mlflow-artifacts:(\/\/[^/]+)?/, '')
      .replace(/^\/+/, '')
      .replace(/\/+$/, '');
    return `${ARTIFACTS_API}/${artifactPath}/${fileName}`;
  }

  if (/^https?:\/\//.test(artifactUri)) {
    return `${artifactUri.replace(/\/+$/, '')}/${fileName}`;
  }

  throw new Error(`Unsupported artifact URI: ${artifactUri}`);
}

/**
 * Human-readable reason for a failed registry call.
 */
export function describeRegistryError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const body: unknown = error.response.data;
      const detail =
        typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string'
          ? body.message
          : error.message;
      return `HTTP ${error.response.status}: ${detail}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
