import {
  ApiException,
  KubeConfig,
  KubernetesObjectApi,
  PatchStrategy,
  type KubernetesObject,
} from '@kubernetes/client-node';
import { ApiError, type ApiVerb } from '../core/errors';
import { logger } from '../core/logger';
import { abortReason } from '../utils/clock';
import type { TargetObject } from '../core/types';
import type { ApiClient } from '../services/apply.service.types';

// Subset of KubernetesObjectApi used here
export interface ObjectApi {
  resource(apiVersion: string, kind: string): Promise<{ namespaced: boolean } | undefined>;
  patch(
    spec: KubernetesObject,
    pretty?: string,
    dryRun?: string,
    fieldManager?: string,
    force?: boolean,
    patchStrategy?: PatchStrategy
  ): Promise<unknown>;
  delete(spec: KubernetesObject): Promise<unknown>;
}

export interface KubeClientOptions {
  fieldManager: string;
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

// Kubernetes reports failures as a Status object, sometimes still JSON-encoded
function parseStatus(body: unknown): { message?: string; reason?: string } {
  let candidate = body;
  if (typeof body === 'string') {
    try {
      candidate = JSON.parse(body);
    } catch {
      return body.length > 0 ? { message: body } : {};
    }
  }
  if (!isRecord(candidate)) {
    return {};
  }
  return {
    message: stringField(candidate, 'message'),
    reason: stringField(candidate, 'reason'),
  };
}

function networkCodeOf(error: unknown): string | undefined {
  let current: unknown = error;
  // fetch implementations wrap the socket error one or two levels deep
  for (let depth = 0; depth < 3 && isRecord(current); depth++) {
    const code = stringField(current, 'code');
    if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
      return code;
    }
    current = current['cause'];
  }
  return undefined;
}

/**
 * Normalise whatever the underlying client threw into an ApiError.
 * Errors that are neither HTTP nor transport failures are passed through
 * untouched and end up unclassified.
 */
export function toApiError(error: unknown, verb: ApiVerb): unknown {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ApiException) {
    const body: unknown = error.body;
    const status = parseStatus(body);
    return ApiError.status(verb, error.code, status.message ?? error.message, status.reason);
  }

  const networkCode = networkCodeOf(error);
  if (networkCode !== undefined) {
    const message = error instanceof Error ? error.message : String(error);
    return ApiError.network(verb, message, networkCode);
  }

  if (error instanceof Error && (error.name === 'FetchError' || error.name === 'AbortError')) {
    return ApiError.network(verb, error.message);
  }

  return error;
}

// Requests already sent cannot be recalled, but no new one starts after an abort
function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * ApiClient backed by the Kubernetes API server: discovery, then server-side
 * apply or delete of a single object.
 */
export class KubernetesApiClient implements ApiClient {
  constructor(
    private readonly api: ObjectApi,
    private readonly options: KubeClientOptions
  ) {}

  static fromKubeConfig(kubeConfig: KubeConfig, options: KubeClientOptions): KubernetesApiClient {
    return new KubernetesApiClient(KubernetesObjectApi.makeApiClient(kubeConfig), options);
  }

  async apply(target: TargetObject, signal?: AbortSignal): Promise<void> {
    const resource = await this.discover(target, signal);
    throwIfAborted(signal);
    try {
      await this.api.patch(
        this.specFor(target, resource.namespaced),
        undefined,
        undefined,
        this.options.fieldManager,
        true,
        PatchStrategy.ServerSideApply
      );
    } catch (error) {
      throw toApiError(error, 'apply');
    }
  }

  async delete(target: TargetObject, signal?: AbortSignal): Promise<void> {
    let resource: { namespaced: boolean };
    try {
      resource = await this.discover(target, signal);
    } catch (error) {
      if (error instanceof ApiError && error.category === 'discovery') {
        logger.debug({ kind: target.kind, name: target.name }, 'Object already deleted (kind not found)');
        return;
      }
      throw error;
    }

    throwIfAborted(signal);
    try {
      await this.api.delete(this.specFor(target, resource.namespaced));
    } catch (error) {
      const normalised = toApiError(error, 'delete');
      if (normalised instanceof ApiError && normalised.statusCode === 404) {
        logger.debug({ kind: target.kind, name: target.name }, 'Object already deleted (not found)');
        return;
      }
      throw normalised;
    }
  }

  private async discover(target: TargetObject, signal?: AbortSignal): Promise<{ namespaced: boolean }> {
    throwIfAborted(signal);
    let resource: { namespaced: boolean } | undefined;
    try {
      resource = await this.api.resource(target.apiVersion, target.kind);
    } catch (error) {
      const normalised = toApiError(error, 'discover');
      if (normalised instanceof ApiError && normalised.statusCode === 404) {
        // Group/version not served yet
        throw ApiError.kindNotRecognized(target.apiVersion, target.kind, 404);
      }
      throw normalised;
    }

    if (resource === undefined) {
      throw ApiError.kindNotRecognized(target.apiVersion, target.kind);
    }
    return resource;
  }

  private specFor(target: TargetObject, namespaced: boolean): KubernetesObject {
    const rawMetadata = isRecord(target.manifest['metadata']) ? target.manifest['metadata'] : {};
    const namespace = target.namespace ?? target.defaultNamespace;
    const metadata = namespaced && namespace !== undefined
      ? { ...rawMetadata, name: target.name, namespace }
      : { ...rawMetadata, name: target.name };

    return {
      ...target.manifest,
      apiVersion: target.apiVersion,
      kind: target.kind,
      metadata,
    };
  }
}

/**
 * Load the kubeconfig from an explicit path, or the usual defaults
 */
export function loadKubeConfig(path?: string): KubeConfig {
  const kubeConfig = new KubeConfig();
  if (path) {
    kubeConfig.loadFromFile(path);
  } else {
    kubeConfig.loadFromDefault();
  }
  return kubeConfig;
}

export function contextNamespace(kubeConfig: KubeConfig): string | undefined {
  return kubeConfig.getContextObject(kubeConfig.getCurrentContext())?.namespace;
}
