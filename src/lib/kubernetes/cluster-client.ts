import type { KubeConfig, KubernetesObject } from '@kubernetes/client-node';
import { KubernetesObjectApi, PatchStrategy } from '@kubernetes/client-node';
import { getErrorMessage } from '../errors/base.js';
import type { Result } from '../utils/result.js';
import { fromPromise } from '../utils/result.js';
import type { ResourceRef, ResourceSpec } from './types.js';

export type ClusterErrorReason = 'conflict' | 'forbidden' | 'not_found' | 'other';

/**
 * A failed cluster call, classified by HTTP status.
 * `statusCode` is 0 when the failure carried no HTTP status (e.g. a network error).
 */
export type ClusterError = {
  reason: ClusterErrorReason;
  statusCode: number;
  message: string;
  ref: ResourceRef;
};

/**
 * The narrow slice of the Kubernetes API the reconciler needs.
 */
export interface ClusterClient {
  create(resource: ResourceSpec): Promise<Result<KubernetesObject, ClusterError>>;
  patch(ref: ResourceRef, body: KubernetesObject): Promise<Result<KubernetesObject, ClusterError>>;
  get(ref: ResourceRef): Promise<Result<KubernetesObject, ClusterError>>;
}

export type ObjectApi = Pick<KubernetesObjectApi, 'create' | 'patch' | 'read'>;

export const DEFAULT_FIELD_MANAGER = 'metacontroller-operator';

const readNumber = (value: unknown, key: string): number | undefined => {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
};

const readObject = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null && key in value ? Reflect.get(value, key) : undefined;

/**
 * Extract an HTTP status from the error shapes @kubernetes/client-node has thrown
 * across releases (ApiException.code, HttpError.statusCode, response.statusCode, body.code).
 */
export const getStatusCode = (error: unknown): number =>
  readNumber(error, 'code') ??
  readNumber(error, 'statusCode') ??
  readNumber(readObject(error, 'response'), 'statusCode') ??
  readNumber(readObject(error, 'body'), 'code') ??
  0;

const getApiMessage = (error: unknown): string => {
  const body = readObject(error, 'body');
  const bodyMessage = readObject(body, 'message');
  if (typeof bodyMessage === 'string') {
    return bodyMessage;
  }
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      const parsedMessage = readObject(parsed, 'message');
      if (typeof parsedMessage === 'string') {
        return parsedMessage;
      }
    } catch {
      return body;
    }
  }
  return getErrorMessage(error);
};

export const classifyStatus = (statusCode: number): ClusterErrorReason => {
  switch (statusCode) {
    case 409:
      return 'conflict';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    default:
      return 'other';
  }
};

export const toClusterError = (ref: ResourceRef, error: unknown): ClusterError => {
  const statusCode = getStatusCode(error);
  return {
    reason: classifyStatus(statusCode),
    statusCode,
    message: getApiMessage(error),
    ref,
  };
};

/**
 * ClusterClient over the generic KubernetesObjectApi, which routes any
 * apiVersion/kind to its REST path.
 */
export class KubernetesClusterClient implements ClusterClient {
  constructor(
    private api: ObjectApi,
    private fieldManager: string = DEFAULT_FIELD_MANAGER
  ) {}

  static fromKubeConfig(kc: KubeConfig, fieldManager?: string): KubernetesClusterClient {
    return new KubernetesClusterClient(KubernetesObjectApi.makeApiClient(kc), fieldManager);
  }

  create(resource: ResourceSpec): Promise<Result<KubernetesObject, ClusterError>> {
    return fromPromise(
      this.api.create(resource.manifest, undefined, undefined, this.fieldManager),
      (error) => toClusterError(resource.ref, error)
    );
  }

  patch(ref: ResourceRef, body: KubernetesObject): Promise<Result<KubernetesObject, ClusterError>> {
    const target: KubernetesObject = {
      ...body,
      apiVersion: ref.apiVersion,
      kind: ref.kind,
      metadata: { ...body.metadata, name: ref.name, namespace: ref.namespace },
    };
    return fromPromise(
      this.api.patch(
        target,
        undefined,
        undefined,
        this.fieldManager,
        undefined,
        PatchStrategy.MergePatch
      ),
      (error) => toClusterError(ref, error)
    );
  }

  get(ref: ResourceRef): Promise<Result<KubernetesObject, ClusterError>> {
    return fromPromise(
      this.api.read({
        apiVersion: ref.apiVersion,
        kind: ref.kind,
        metadata: { name: ref.name, namespace: ref.namespace },
      }),
      (error) => toClusterError(ref, error)
    );
  }
}
