import { SystemError, type ErrorSeverity } from './system-error';

/**
 * System health errors (codes 4000-4999)
 * Used for health probes and process-level misconfiguration.
 */
export class SystemHealthError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: ErrorSeverity,
    public readonly component?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }
}

export const SYSTEM_HEALTH_ERROR_CODES = {
  /** Database connectivity failure (critical) */
  DATABASE_FAILURE: 4001,
  /** Database file could not be opened (critical) */
  DATABASE_INITIALIZATION_FAILED: 4002,
} as const;
