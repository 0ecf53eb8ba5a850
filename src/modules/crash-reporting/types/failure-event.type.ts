/**
 * 'panic': unexpected failure recovered mid-request.
 * 'error': failure reported while the process was starting.
 */
export type FailureKind = 'panic' | 'error';

/**
 * One recovered failure. Built once, frozen, handed to a single dispatch.
 * Never persisted.
 */
export interface FailureEvent {
  readonly tenantId?: string;
  /** Capture time, ISO 8601 UTC */
  readonly timestamp: string;
  readonly sourceFile?: string;
  /** Positive integer when present */
  readonly sourceLine?: number;
  readonly rawMessage: string;
  /** Captured trace, verbatim */
  readonly traceText: string;
  readonly requestPath: string;
  readonly requestMethod: string;
  readonly userAgent: string;
  readonly kind: FailureKind;
}

/** Request metadata used for failures that happen outside request handling. */
export const STARTUP_REQUEST_METADATA = {
  requestPath: 'STARTUP',
  requestMethod: 'STARTUP',
  userAgent: 'STARTUP_ERROR',
} as const;
