import { SystemError } from './system-error';

/**
 * Persistence errors (codes 5000-5999).
 * Raised by repositories when a statement fails; the message carries the
 * driver's reason, matching the "Database error: ..." responses of the API.
 */
export class PersistenceError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly operation: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, 'error', metadata);
  }

  static fromDriverError(
    code: number,
    operation: string,
    error: unknown,
  ): PersistenceError {
    const reason = error instanceof Error ? error.message : String(error);
    return new PersistenceError(code, `Database error: ${reason}`, operation, {
      driverCode:
        error instanceof Error && 'code' in error
          ? String(error.code)
          : undefined,
    });
  }
}

export const PERSISTENCE_ERROR_CODES = {
  /** SELECT failed */
  QUERY_FAILED: 5001,
  /** INSERT/UPDATE/DELETE failed */
  WRITE_FAILED: 5002,
} as const;
