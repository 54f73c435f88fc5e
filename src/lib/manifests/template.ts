import type { ManifestError } from '../errors/manifest-errors.js';
import { ManifestErrors } from '../errors/manifest-errors.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

/**
 * Values substituted into manifest templates
 */
export type RenderContext = {
  appName: string;
  namespace: string;
  image: string;
};

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export const templateVariables = (context: RenderContext): Record<string, string> => ({
  app_name: context.appName,
  namespace: context.namespace,
  metacontroller_image: context.image,
});

/**
 * Replace every `{{ name }}` placeholder. Unknown names fail rather than render empty.
 */
export const renderTemplate = (
  template: string,
  context: RenderContext
): Result<string, ManifestError> => {
  const variables = templateVariables(context);

  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name === undefined || !Object.hasOwn(variables, name)) {
      return err(ManifestErrors.UNKNOWN_VARIABLE(name ?? match[0]));
    }
  }

  return ok(template.replace(PLACEHOLDER, (_placeholder, name: string) => variables[name] ?? ''));
};
