import type { FailureEvent, FailureReport } from './types';

function orNull(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

export function toFailureReport(event: FailureEvent): FailureReport {
  const line =
    event.sourceLine !== undefined &&
    Number.isInteger(event.sourceLine) &&
    event.sourceLine > 0
      ? event.sourceLine
      : null;

  return {
    boardId: orNull(event.tenantId),
    timestamp: event.timestamp,
    file: orNull(event.sourceFile),
    line,
    stackTrace: event.traceText,
    message: event.rawMessage,
    exceptionType: event.kind,
    requestPath: event.requestPath,
    requestMethod: event.requestMethod,
    userAgent: event.userAgent,
  };
}

/**
 * Serializes a failure as the JSON body POSTed to the telemetry endpoint.
 * String escaping is JSON's: `\` and `"` are backslash-escaped, newline,
 * carriage return and tab become `\n` `\r` `\t`, other control characters
 * become `\u00XX`. Unknown values are `null`, never `""` or missing keys.
 */
export function encodeFailureReport(event: FailureEvent): string {
  return JSON.stringify(toFailureReport(event));
}
