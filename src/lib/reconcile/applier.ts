import type { K8sError } from '../errors/k8s-errors.js';
import { K8sErrors } from '../errors/k8s-errors.js';
import type { ClusterClient, ClusterError } from '../kubernetes/cluster-client.js';
import type { ResourceRef, ResourceSpec } from '../kubernetes/types.js';
import { formatRef } from '../kubernetes/types.js';
import type { Logger } from '../logging/logger.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

/**
 * What to do when a create hits an existing object:
 * - none: the conflict is returned as an error
 * - patch: merge-patch the full manifest onto the existing object
 * - replace: accepted but not implemented; fails explicitly
 */
export const CONFLICT_POLICIES = ['none', 'patch', 'replace'] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export type AppliedResource = {
  ref: ResourceRef;
  action: 'created' | 'patched';
};

const toK8sError = (failure: ClusterError): K8sError =>
  failure.reason === 'forbidden'
    ? K8sErrors.FORBIDDEN(failure.ref, failure.message)
    : K8sErrors.API_ERROR(failure.ref, failure.statusCode, failure.message);

async function resolveConflict(
  client: ClusterClient,
  resource: ResourceSpec,
  policy: ConflictPolicy,
  logger: Logger
): Promise<Result<AppliedResource, K8sError>> {
  const id = formatRef(resource.ref);

  switch (policy) {
    case 'none':
      return err(K8sErrors.CONFLICT(resource.ref));
    case 'replace':
      logger.error(`Conflict policy "replace" requested for ${id}`);
      return err(K8sErrors.REPLACE_NOT_SUPPORTED(resource.ref));
    case 'patch': {
      logger.info(`Caught 409 when creating ${id}. Trying to patch`);
      const patched = await client.patch(resource.ref, resource.manifest);
      if (!patched.ok) {
        logger.error(`Failed to patch ${id}`, {
          data: { statusCode: patched.error.statusCode, reason: patched.error.reason },
          error: patched.error,
        });
        return err(toK8sError(patched.error));
      }
      return ok({ ref: resource.ref, action: 'patched' });
    }
  }
}

/**
 * Create every resource in order, resolving "already exists" with `policy`.
 *
 * Stops at the first failure; resources created before it stay created.
 * A 403 comes back as K8S_FORBIDDEN so callers can tell a missing privilege grant
 * apart from other API failures.
 */
export async function applyResources(
  client: ClusterClient,
  resources: readonly ResourceSpec[],
  policy: ConflictPolicy,
  logger: Logger
): Promise<Result<AppliedResource[], K8sError>> {
  const applied: AppliedResource[] = [];

  for (const resource of resources) {
    const id = formatRef(resource.ref);
    logger.info(`Creating ${id}`);

    const created = await client.create(resource);
    if (created.ok) {
      applied.push({ ref: resource.ref, action: 'created' });
      continue;
    }

    const failure = created.error;
    if (failure.reason === 'conflict') {
      const resolved = await resolveConflict(client, resource, policy, logger);
      if (!resolved.ok) {
        return resolved;
      }
      applied.push(resolved.value);
      continue;
    }

    logger.error(`Failed to create ${id}`, {
      data: { statusCode: failure.statusCode, reason: failure.reason },
      error: failure,
    });
    return err(toK8sError(failure));
  }

  return ok(applied);
}
