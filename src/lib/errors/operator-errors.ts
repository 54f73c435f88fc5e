import { createError } from './base.js';

export const OperatorErrors = {
  REMOVE_NOT_SUPPORTED: createError(
    'OPERATOR_REMOVE_NOT_SUPPORTED',
    'Removing the deployed resources is not supported',
    501
  ),
  NO_HANDLER: (trigger: string) =>
    createError('RUNTIME_NO_HANDLER', `No handler observes the "${trigger}" trigger`, 404, {
      trigger,
    }),
  HANDLER_FAILED: (trigger: string, error: string) =>
    createError('RUNTIME_HANDLER_FAILED', `Handler for "${trigger}" failed: ${error}`, 500, {
      trigger,
      error,
    }),
} as const;
