import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getErrorMessage } from '../errors/base.js';
import type { ManifestError } from '../errors/manifest-errors.js';
import { ManifestErrors } from '../errors/manifest-errors.js';
import type { ResourceSpec } from '../kubernetes/types.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';
import { parseManifests } from './parse.js';
import type { RenderContext } from './template.js';
import { renderTemplate } from './template.js';

/** Resource groups, in the order they must be applied */
export const RESOURCE_GROUPS = ['rbac', 'crds', 'controller'] as const;

export type ResourceGroup = (typeof RESOURCE_GROUPS)[number];

export const RESOURCE_FILES: Record<ResourceGroup, string> = {
  rbac: 'metacontroller-rbac.yaml',
  crds: 'metacontroller-crds-v1.yaml',
  controller: 'metacontroller.yaml',
};

export const DEFAULT_MANIFESTS_DIR = fileURLToPath(new URL('../../../manifests/', import.meta.url));

export type ManifestRendererOptions = {
  context: RenderContext;
  manifestsDir?: string;
  files?: Partial<Record<ResourceGroup, string>>;
};

/**
 * Renders the desired resource set from the immutable templates and the render context.
 * Holds no state beyond its inputs, so every call re-derives the same set.
 */
export class ManifestRenderer {
  readonly manifestsDir: string;
  private readonly context: RenderContext;
  private readonly files: Record<ResourceGroup, string>;

  constructor(options: ManifestRendererOptions) {
    this.context = options.context;
    this.manifestsDir = options.manifestsDir ?? DEFAULT_MANIFESTS_DIR;
    this.files = { ...RESOURCE_FILES, ...options.files };
  }

  templatePath(group: ResourceGroup): string {
    return path.join(this.manifestsDir, this.files[group]);
  }

  async render(group: ResourceGroup): Promise<Result<ResourceSpec[], ManifestError>> {
    const file = this.templatePath(group);

    let template: string;
    try {
      template = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return err(ManifestErrors.TEMPLATE_NOT_FOUND(group, file));
      }
      return err(ManifestErrors.TEMPLATE_UNREADABLE(file, getErrorMessage(error)));
    }

    const rendered = renderTemplate(template, this.context);
    if (!rendered.ok) {
      return rendered;
    }

    return parseManifests(rendered.value, this.files[group]);
  }

  /**
   * All groups concatenated in apply order.
   */
  async renderAll(): Promise<Result<ResourceSpec[], ManifestError>> {
    const resources: ResourceSpec[] = [];
    for (const group of RESOURCE_GROUPS) {
      const rendered = await this.render(group);
      if (!rendered.ok) {
        return rendered;
      }
      resources.push(...rendered.value);
    }
    return ok(resources);
  }
}
