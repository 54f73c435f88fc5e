import type { KubernetesObject } from '@kubernetes/client-node';

/**
 * Identity of a cluster object. Cluster-scoped kinds carry no namespace.
 */
export type ResourceRef = {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
};

/**
 * A manifest body: the typed object header plus whatever the kind carries (spec, rules, ...).
 */
export type KubernetesManifest = KubernetesObject & { [key: string]: unknown };

/** Kinds whose health is judged by ready vs desired replica counts */
export const WORKLOAD_KINDS = ['StatefulSet', 'Deployment'] as const;

export type WorkloadKind = (typeof WORKLOAD_KINDS)[number];

export const CLUSTER_SCOPED_KINDS = [
  'ClusterRole',
  'ClusterRoleBinding',
  'CustomResourceDefinition',
  'Namespace',
] as const;

/**
 * Capability of workload objects: a desired replica count and an observed ready count.
 */
export interface HasReplicaStatus {
  spec?: { replicas?: number };
  status?: { readyReplicas?: number };
}

export type WorkloadResource = {
  type: 'workload';
  kind: WorkloadKind;
  ref: ResourceRef & { namespace: string };
  manifest: KubernetesManifest;
};

export type NamespacedResource = {
  type: 'namespaced';
  ref: ResourceRef & { namespace: string };
  manifest: KubernetesManifest;
};

export type ClusterResource = {
  type: 'cluster';
  ref: ResourceRef;
  manifest: KubernetesManifest;
};

/**
 * A fully rendered resource, tagged by how it is scoped and checked.
 */
export type ResourceSpec = WorkloadResource | NamespacedResource | ClusterResource;

export const isWorkloadKind = (kind: string): kind is WorkloadKind =>
  WORKLOAD_KINDS.some((workloadKind) => workloadKind === kind);

export const isClusterScopedKind = (kind: string): boolean =>
  CLUSTER_SCOPED_KINDS.some((clusterKind) => clusterKind === kind);

export const formatRef = (ref: ResourceRef): string =>
  ref.namespace ? `${ref.kind}/${ref.namespace}/${ref.name}` : `${ref.kind}/${ref.name}`;
