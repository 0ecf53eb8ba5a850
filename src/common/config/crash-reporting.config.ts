/**
 * Process-wide crash reporting settings, read once at startup and injected
 * under CRASH_REPORTING_CONFIG. Nothing on the failure path reads process.env.
 */
export interface CrashReportingConfig {
  /** Telemetry endpoint. Absent disables all reporting. */
  readonly endpointUrl?: string;
  /** Statically configured tenant (board) id. */
  readonly boardId?: string;
}

export const CRASH_REPORTING_CONFIG = 'CRASH_REPORTING_CONFIG';

export const CRASH_REPORTING_ENV = {
  ENDPOINT_URL: 'RUNTIME_ERROR_ENDPOINT_URL',
  BOARD_ID: 'BOARD_ID',
} as const;

type EnvSource = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadCrashReportingConfig(
  source: EnvSource,
): CrashReportingConfig {
  return Object.freeze({
    endpointUrl: nonEmpty(source[CRASH_REPORTING_ENV.ENDPOINT_URL]),
    boardId: nonEmpty(source[CRASH_REPORTING_ENV.BOARD_ID]),
  });
}
