import type { FailureKind } from './failure-event.type';

/** Wire record POSTed to the telemetry endpoint. Unknown values are null. */
export interface FailureReport {
  boardId: string | null;
  timestamp: string;
  file: string | null;
  line: number | null;
  stackTrace: string;
  message: string;
  exceptionType: FailureKind;
  requestPath: string;
  requestMethod: string;
  userAgent: string;
}
