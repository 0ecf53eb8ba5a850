export type { FailureEvent, FailureKind } from './failure-event.type';
export { STARTUP_REQUEST_METADATA } from './failure-event.type';
export type { FailureReport } from './failure-report.type';
export type { StackFrame, SourceLocation } from './stack-frame.type';
export type { TenantRequest, HeaderValue } from './tenant-request.type';
export type { DispatchOutcome } from './dispatch-outcome.type';
