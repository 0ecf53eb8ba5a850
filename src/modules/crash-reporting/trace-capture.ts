import {
  RECOVERY_TRACE_LIMIT,
  STARTUP_TRACE_LIMIT,
} from './crash-reporting.constants';
import { describeFailure } from './failure-event.factory';

const FRAME_LINE = /^\s+at /;

function truncate(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

/** Frames of the current stack, starting at the caller of `boundary`. */
function framesAbove(boundary: (...args: never[]) => unknown): string[] {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  return (holder.stack ?? '')
    .split('\n')
    .filter((line) => FRAME_LINE.test(line));
}

function failingUnit(failure: unknown): string {
  if (failure instanceof Error && typeof failure.stack === 'string') {
    return failure.stack;
  }
  return describeFailure(failure);
}

/**
 * Trace of every unit involved in a recovery: the failure's own stack (its
 * origin), then the stack recovery is running on. Recovery runs on a later
 * tick than the throw, so only the failure's stack shows where it happened.
 */
export function captureRecoveryTrace(
  failure: unknown,
  limit: number = RECOVERY_TRACE_LIMIT,
): string {
  const text = [
    '[failing]',
    failingUnit(failure),
    '',
    '[recovering]',
    ...framesAbove(captureRecoveryTrace),
  ].join('\n');
  return truncate(text, limit);
}

/** Trace of the failing unit only. Used when the process fails to start. */
export function captureStartupTrace(
  failure: unknown,
  limit: number = STARTUP_TRACE_LIMIT,
): string {
  return truncate(failingUnit(failure), limit);
}
