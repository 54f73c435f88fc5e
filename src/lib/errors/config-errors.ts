import { createError } from './base.js';

export const ConfigErrors = {
  INVALID: (issues: string[]) =>
    createError('CONFIG_INVALID', `Invalid operator configuration: ${issues.join('; ')}`, 400, {
      issues,
    }),
} as const;

export type ConfigError = ReturnType<typeof ConfigErrors.INVALID>;
