import type { SourceLocation, StackFrame } from './types';

// `    at Descriptor (path:line:column)` or `    at path:line:column`
const FRAME_PATTERN = /^\s*at (?:(.*?) \()?(.+?):(\d+)(?::(\d+))?\)?\s*$/;

const SOURCE_EXTENSION = /\.(?:ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;

/**
 * Descriptors belonging to the recovery pipeline itself, or to the runtime's
 * scheduling of detached work. Frames naming them are never the origin.
 */
export const MACHINERY_FRAME_MARKERS: readonly string[] = [
  'PanicRecoveryFilter',
  'ReportDispatcherService',
  'reportStartupFailure',
  'captureRecoveryTrace',
  'captureStartupTrace',
  'Error.captureStackTrace',
  'processTicksAndRejections',
  'listOnTimeout',
];

/** Runtime, toolchain and installed-package locations. */
export const RUNTIME_PATH_MARKERS: readonly string[] = [
  '/node_modules/',
  '\\node_modules\\',
  '/usr/lib/node',
  '/usr/local/lib/node',
  '/.nvm/versions/',
  '/.volta/',
];

const RUNTIME_PATH_PREFIXES: readonly string[] = ['node:', 'internal/'];

function normalizePath(path: string): string {
  return path.startsWith('file://') ? path.slice('file://'.length) : path;
}

/**
 * Parses V8 stack text into frames. Lines that are not frames (error
 * headers, unit headers, `at` lines without a location) are skipped.
 */
export function parseStackFrames(traceText: string): StackFrame[] {
  const frames: StackFrame[] = [];
  for (const line of traceText.split(/\r?\n/)) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    const [, descriptor = '', path, lineText, columnText] = match;
    frames.push({
      descriptor,
      path: normalizePath(path),
      line: Number.parseInt(lineText, 10),
      column:
        columnText === undefined ? undefined : Number.parseInt(columnText, 10),
    });
  }
  return frames;
}

export function isMachineryFrame(frame: StackFrame): boolean {
  return MACHINERY_FRAME_MARKERS.some((marker) =>
    frame.descriptor.includes(marker),
  );
}

export function isRuntimeFrame(frame: StackFrame): boolean {
  return (
    RUNTIME_PATH_PREFIXES.some((prefix) => frame.path.startsWith(prefix)) ||
    RUNTIME_PATH_MARKERS.some((marker) => frame.path.includes(marker))
  );
}

/**
 * Returns the first application frame in scan order: a source file that is
 * neither recovery machinery nor runtime code, with a positive line number.
 * File and line are best-effort hints; a reordered or truncated trace yields
 * a plausible but wrong location.
 */
export function locateSourceFrame(
  traceText: string,
): SourceLocation | undefined {
  for (const frame of parseStackFrames(traceText)) {
    if (!SOURCE_EXTENSION.test(frame.path)) {
      continue;
    }
    if (isMachineryFrame(frame) || isRuntimeFrame(frame)) {
      continue;
    }
    if (Number.isInteger(frame.line) && frame.line > 0) {
      const file = frame.path.split(/[\\/]/).pop() ?? frame.path;
      return { file, line: frame.line };
    }
  }
  return undefined;
}
