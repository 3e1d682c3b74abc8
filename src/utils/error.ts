// Path: src/utils/error.ts
// Error handling utilities - base error type and message extraction

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Extract the errno-style code (ENOENT, EACCES, ...) from a filesystem error.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Check if an error is a permission/access error.
 */
export function isPermissionError(err: unknown): boolean {
  const code = getErrorCode(err);
  return code === 'EACCES' || code === 'EPERM' || code === 'EROFS';
}

/**
 * Base error for every failure of a provisioning run.
 * `code` is stable and meant for scripting; `metadata` carries the context
 * (secret name, template id, path) the operator needs to fix the cause.
 */
export class ProvisionError extends Error {
  readonly code: string;
  readonly metadata: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ProvisionError';
    this.code = code;
    this.metadata = options?.metadata ?? {};

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Wrap an unknown error into a ProvisionError.
 * ProvisionErrors pass through unchanged.
 *
 * @param err - Unknown error value
 * @param code - Error code
 * @param metadata - Additional metadata
 */
export function wrapError(
  err: unknown,
  code: string,
  metadata?: Record<string, unknown>
): ProvisionError {
  if (err instanceof ProvisionError) {
    return err;
  }
  return new ProvisionError(extractErrorMessage(err), code, { cause: err, metadata });
}
