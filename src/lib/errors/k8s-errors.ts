import type { ResourceRef } from '../kubernetes/types.js';
import { formatRef } from '../kubernetes/types.js';
import type { AppError } from './base.js';
import { createError } from './base.js';

export type K8sError = AppError;

export const K8sErrors = {
  KUBECONFIG_NOT_FOUND: (tried: string[]) =>
    createError(
      'K8S_KUBECONFIG_NOT_FOUND',
      `No kubeconfig found. Tried: ${tried.join(', ')}`,
      404,
      { tried }
    ),

  CONTEXT_NOT_FOUND: (context: string) =>
    createError('K8S_CONTEXT_NOT_FOUND', `Kubernetes context not found: ${context}`, 404, {
      context,
    }),

  FORBIDDEN: (ref: ResourceRef, message: string) =>
    createError('K8S_FORBIDDEN', `Forbidden (403) on ${formatRef(ref)}: ${message}`, 403, {
      ...ref,
    }),

  CONFLICT: (ref: ResourceRef) =>
    createError('K8S_CONFLICT', `${formatRef(ref)} already exists`, 409, { ...ref }),

  REPLACE_NOT_SUPPORTED: (ref: ResourceRef) =>
    createError(
      'K8S_REPLACE_NOT_SUPPORTED',
      `Conflict policy "replace" is not implemented (resource ${formatRef(ref)})`,
      501,
      { ...ref }
    ),

  RESOURCES_NOT_READY: (discrepancies: string[], attempts: number, elapsedMs: number) =>
    createError(
      'K8S_RESOURCES_NOT_READY',
      `Resources not ready after ${attempts} attempts (${elapsedMs}ms)`,
      408,
      { discrepancies, attempts, elapsedMs }
    ),

  API_ERROR: (ref: ResourceRef, statusCode: number, message: string) =>
    createError(
      'K8S_API_ERROR',
      `Kubernetes API error (${statusCode}) on ${formatRef(ref)}: ${message}`,
      statusCode === 0 ? 502 : statusCode,
      { ...ref, statusCode }
    ),
};
