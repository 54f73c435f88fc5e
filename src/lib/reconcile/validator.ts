import { z } from 'zod';
import type { ClusterClient, ClusterError } from '../kubernetes/cluster-client.js';
import type { HasReplicaStatus, ResourceRef, ResourceSpec, WorkloadResource } from '../kubernetes/types.js';
import type { Logger } from '../logging/logger.js';

export type ReconciliationOutcome = {
  allOk: boolean;
  discrepancies: string[];
};

/** Kubernetes defaults spec.replicas to 1 when it is omitted */
const DEFAULT_REPLICAS = 1;

export const replicaStatusSchema: z.ZodType<HasReplicaStatus> = z.object({
  spec: z.object({ replicas: z.number().int().nonnegative().optional() }).optional(),
  status: z.object({ readyReplicas: z.number().int().nonnegative().optional() }).optional(),
});

export const describeRef = (ref: ResourceRef): string =>
  ref.namespace
    ? `${ref.kind} ${ref.name} in namespace ${ref.namespace}`
    : `${ref.kind} ${ref.name}`;

export const describeFetchFailure = (failure: ClusterError): string => {
  const subject = describeRef(failure.ref);
  switch (failure.reason) {
    case 'not_found':
      return `Cannot find k8s object ${subject}`;
    case 'forbidden':
      return `Not permitted to read k8s object ${subject} (403): ${failure.message}`;
    default:
      return `Cannot read k8s object ${subject} (${failure.statusCode}): ${failure.message}`;
  }
};

/**
 * Compare ready and desired replicas of a live workload. Returns a discrepancy or null.
 */
export const checkReplicas = (resource: WorkloadResource, live: unknown): string | null => {
  const subject = describeRef(resource.ref);
  const parsed = replicaStatusSchema.safeParse(live);
  if (!parsed.success) {
    return `${subject} has an unreadable replica status`;
  }

  const desired = parsed.data.spec?.replicas ?? DEFAULT_REPLICAS;
  const ready = parsed.data.status?.readyReplicas ?? 0;
  if (ready === desired) {
    return null;
  }
  return `${subject} has ${ready} readyReplicas, expected ${desired}`;
};

/**
 * Fetch every expected resource and report what is missing or not ready.
 *
 * Never stops early: each failed fetch becomes a discrepancy and the remaining
 * resources are still checked. No retries happen here.
 */
export async function validateResources(
  client: ClusterClient,
  expected: readonly ResourceSpec[],
  logger: Logger
): Promise<ReconciliationOutcome> {
  const discrepancies: string[] = [];

  logger.info('Checking for expected resources', { data: { count: expected.length } });
  for (const resource of expected) {
    const found = await client.get(resource.ref);
    if (!found.ok) {
      discrepancies.push(describeFetchFailure(found.error));
      continue;
    }

    switch (resource.type) {
      case 'workload': {
        const problem = checkReplicas(resource, found.value);
        if (problem) {
          discrepancies.push(problem);
        }
        break;
      }
      case 'namespaced':
      case 'cluster':
        break;
    }
  }

  for (const discrepancy of discrepancies) {
    logger.info(discrepancy);
  }

  return { allOk: discrepancies.length === 0, discrepancies };
}
