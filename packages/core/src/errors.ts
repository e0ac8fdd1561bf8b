export type ErrorCode = 'CONFIG_INVALID' | 'INVALID_JSON' | 'INTERNAL';

export interface AppErrorOptions {
  cause?: unknown;
  /** One line per problem, e.g. each failing config key */
  issues?: readonly string[];
}

/** Error carrying a machine-readable code, thrown across package boundaries. */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly issues: readonly string[];

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.issues = options.issues ?? [];
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

/** Wrap anything thrown into an AppError, keeping the original as `cause`. */
export function toAppError(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new AppError(fallbackCode, message, { cause: error });
}
