import type { FailureEvent, FailureKind, SourceLocation } from './types';

export interface FailureEventInput {
  failure: unknown;
  kind: FailureKind;
  traceText: string;
  tenantId?: string;
  location?: SourceLocation;
  requestPath: string;
  requestMethod: string;
  userAgent: string;
  /** Defaults to now */
  capturedAt?: Date;
}

/** Message text for any thrown value. */
export function describeFailure(failure: unknown): string {
  if (failure instanceof Error) {
    return failure.message;
  }
  if (typeof failure === 'string') {
    return failure;
  }
  if (typeof failure === 'object' && failure !== null) {
    try {
      // undefined when toJSON yields nothing
      const json: string | undefined = JSON.stringify(failure);
      return json ?? String(failure);
    } catch {
      return Object.prototype.toString.call(failure);
    }
  }
  return String(failure);
}

export function createFailureEvent(input: FailureEventInput): FailureEvent {
  return Object.freeze({
    tenantId: input.tenantId,
    timestamp: (input.capturedAt ?? new Date()).toISOString(),
    sourceFile: input.location?.file,
    sourceLine: input.location?.line,
    rawMessage: describeFailure(input.failure),
    traceText: input.traceText,
    requestPath: input.requestPath,
    requestMethod: input.requestMethod,
    userAgent: input.userAgent,
    kind: input.kind,
  });
}
