export interface AppError {
  code: string;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

export const createError = (
  code: string,
  message: string,
  status: number,
  details?: Record<string, unknown>
): AppError => ({
  code,
  message,
  status,
  details,
});

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
