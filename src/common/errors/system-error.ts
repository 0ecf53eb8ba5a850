export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Base error class for deliberately raised system errors.
 * Subclasses define error code ranges:
 * - SystemHealthError: 4000-4999
 * - PersistenceError: 5000-5999
 *
 * Anything thrown that is NOT a SystemError (or an HttpException) is treated
 * as an unexpected failure by PanicRecoveryFilter and gets crash-reported.
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverity,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
