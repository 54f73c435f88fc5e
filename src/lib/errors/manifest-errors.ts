import { createError } from './base.js';

export const ManifestErrors = {
  TEMPLATE_NOT_FOUND: (group: string, path: string) =>
    createError('MANIFEST_TEMPLATE_NOT_FOUND', `Manifest template for "${group}" not found`, 404, {
      group,
      path,
    }),
  TEMPLATE_UNREADABLE: (path: string, error: string) =>
    createError('MANIFEST_TEMPLATE_UNREADABLE', `Failed to read manifest template ${path}`, 500, {
      path,
      error,
    }),
  UNKNOWN_VARIABLE: (variable: string) =>
    createError(
      'MANIFEST_UNKNOWN_VARIABLE',
      `Manifest template references unknown variable "${variable}"`,
      400,
      { variable }
    ),
  INVALID_YAML: (source: string, error: string) =>
    createError('MANIFEST_INVALID_YAML', `Manifest ${source} is not valid YAML`, 400, {
      source,
      error,
    }),
  INVALID_DOCUMENT: (source: string, index: number, issues: string[]) =>
    createError(
      'MANIFEST_INVALID_DOCUMENT',
      `Document ${index} of ${source} is not a valid Kubernetes object: ${issues.join('; ')}`,
      400,
      { source, index, issues }
    ),
} as const;

export type ManifestError =
  | ReturnType<typeof ManifestErrors.TEMPLATE_NOT_FOUND>
  | ReturnType<typeof ManifestErrors.TEMPLATE_UNREADABLE>
  | ReturnType<typeof ManifestErrors.UNKNOWN_VARIABLE>
  | ReturnType<typeof ManifestErrors.INVALID_YAML>
  | ReturnType<typeof ManifestErrors.INVALID_DOCUMENT>;
