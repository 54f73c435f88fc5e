import { parseAllDocuments } from 'yaml';
import { z } from 'zod';
import { getErrorMessage } from '../errors/base.js';
import type { ManifestError } from '../errors/manifest-errors.js';
import { ManifestErrors } from '../errors/manifest-errors.js';
import type { KubernetesManifest, ResourceSpec } from '../kubernetes/types.js';
import { isClusterScopedKind, isWorkloadKind } from '../kubernetes/types.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

export const manifestDocumentSchema = z.record(z.unknown());

export const manifestHeaderSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.string().min(1),
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().min(1).optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  }),
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/**
 * Tag a validated document by scope. Namespaced kinds must name their namespace.
 */
export const toResourceSpec = (
  document: Record<string, unknown>,
  source: string,
  index: number
): Result<ResourceSpec, ManifestError> => {
  const header = manifestHeaderSchema.safeParse(document);
  if (!header.success) {
    return err(ManifestErrors.INVALID_DOCUMENT(source, index, formatIssues(header.error)));
  }

  const { apiVersion, kind, metadata } = header.data;
  const manifest: KubernetesManifest = { ...document, apiVersion, kind, metadata };

  if (isClusterScopedKind(kind)) {
    return ok({ type: 'cluster', ref: { apiVersion, kind, name: metadata.name }, manifest });
  }

  const namespace = metadata.namespace;
  if (!namespace) {
    return err(
      ManifestErrors.INVALID_DOCUMENT(source, index, [
        `metadata.namespace: required for namespaced kind ${kind}`,
      ])
    );
  }

  const ref = { apiVersion, kind, name: metadata.name, namespace };
  if (isWorkloadKind(kind)) {
    return ok({ type: 'workload', kind, ref, manifest });
  }
  return ok({ type: 'namespaced', ref, manifest });
};

/**
 * Parse a multi-document YAML stream into resource specs, in document order.
 * Empty documents (a trailing `---`) are skipped.
 */
export const parseManifests = (
  text: string,
  source: string
): Result<ResourceSpec[], ManifestError> => {
  const resources: ResourceSpec[] = [];
  let index = 0;

  for (const document of parseAllDocuments(text)) {
    const firstError = document.errors[0];
    if (firstError) {
      return err(ManifestErrors.INVALID_YAML(source, firstError.message));
    }

    let value: unknown;
    try {
      value = document.toJS();
    } catch (error) {
      return err(ManifestErrors.INVALID_YAML(source, getErrorMessage(error)));
    }

    if (value === null || value === undefined) {
      continue;
    }

    const parsed = manifestDocumentSchema.safeParse(value);
    if (!parsed.success) {
      return err(ManifestErrors.INVALID_DOCUMENT(source, index, ['document must be a mapping']));
    }

    const resource = toResourceSpec(parsed.data, source, index);
    if (!resource.ok) {
      return resource;
    }
    resources.push(resource.value);
    index++;
  }

  return ok(resources);
};
