import { describe, expect, it } from 'vitest';
import { createError, getErrorMessage } from '../base.js';
import { ConfigErrors } from '../config-errors.js';
import { K8sErrors } from '../k8s-errors.js';
import { ManifestErrors } from '../manifest-errors.js';
import { OperatorErrors } from '../operator-errors.js';

const sts = { apiVersion: 'apps/v1', kind: 'StatefulSet', name: 'mc', namespace: 'kubeflow' };
const role = { apiVersion: 'rbac.authorization.k8s.io/v1', kind: 'ClusterRole', name: 'view' };

describe('error catalog', () => {
  it('createError builds AppError objects', () => {
    expect(createError('SAMPLE', 'Sample error', 418, { note: 'ok' })).toEqual({
      code: 'SAMPLE',
      message: 'Sample error',
      status: 418,
      details: { note: 'ok' },
    });
  });

  it('K8sErrors.FORBIDDEN', () => {
    expect(K8sErrors.FORBIDDEN(role, 'clusterroles is forbidden')).toEqual({
      code: 'K8S_FORBIDDEN',
      message: 'Forbidden (403) on ClusterRole/view: clusterroles is forbidden',
      status: 403,
      details: role,
    });
  });

  it('K8sErrors.CONFLICT', () => {
    expect(K8sErrors.CONFLICT(sts).message).toBe('StatefulSet/kubeflow/mc already exists');
  });

  it('K8sErrors.API_ERROR maps a missing status to 502', () => {
    const error = K8sErrors.API_ERROR(sts, 0, 'socket hang up');

    expect(error.status).toBe(502);
    expect(error.message).toBe('Kubernetes API error (0) on StatefulSet/kubeflow/mc: socket hang up');
    expect(error.details).toEqual({ ...sts, statusCode: 0 });
  });

  it('K8sErrors.API_ERROR keeps an HTTP status', () => {
    expect(K8sErrors.API_ERROR(sts, 422, 'invalid').status).toBe(422);
  });

  it('K8sErrors.RESOURCES_NOT_READY', () => {
    expect(K8sErrors.RESOURCES_NOT_READY(['x'], 3, 700)).toEqual({
      code: 'K8S_RESOURCES_NOT_READY',
      message: 'Resources not ready after 3 attempts (700ms)',
      status: 408,
      details: { discrepancies: ['x'], attempts: 3, elapsedMs: 700 },
    });
  });

  it('ManifestErrors.INVALID_DOCUMENT', () => {
    expect(ManifestErrors.INVALID_DOCUMENT('rbac.yaml', 2, ['kind: Required', 'apiVersion: Required']).message).toBe(
      'Document 2 of rbac.yaml is not a valid Kubernetes object: kind: Required; apiVersion: Required'
    );
  });

  it('OperatorErrors.REMOVE_NOT_SUPPORTED', () => {
    expect(OperatorErrors.REMOVE_NOT_SUPPORTED).toEqual({
      code: 'OPERATOR_REMOVE_NOT_SUPPORTED',
      message: 'Removing the deployed resources is not supported',
      status: 501,
      details: undefined,
    });
  });

  it('OperatorErrors.HANDLER_FAILED', () => {
    expect(OperatorErrors.HANDLER_FAILED('install', 'boom').message).toBe(
      'Handler for "install" failed: boom'
    );
  });

  it('ConfigErrors.INVALID', () => {
    expect(ConfigErrors.INVALID(['namespace: Required']).message).toBe(
      'Invalid operator configuration: namespace: Required'
    );
  });

  it('getErrorMessage handles non-errors', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
