import { Logger } from '@nestjs/common';
import type { CrashReportingConfig } from '../../common/config/crash-reporting.config';
import { createFailureEvent } from './failure-event.factory';
import { encodeFailureReport } from './report-encoder';
import { ReportDispatcherService } from './report-dispatcher.service';
import { captureStartupTrace } from './trace-capture';
import { locateSourceFrame } from './trace-locator';
import { STARTUP_REQUEST_METADATA, type DispatchOutcome } from './types';

const logger = new Logger('StartupFailure');

/**
 * Reports a failure that stopped the process from starting (e.g. the port
 * could not be bound). Waits for the single dispatch attempt, which is
 * bounded by the dispatcher's timeout; the caller exits afterwards.
 *
 * Resolves to undefined when reporting is not configured.
 */
export async function reportStartupFailure(
  failure: unknown,
  config: CrashReportingConfig,
  dispatcher: ReportDispatcherService = new ReportDispatcherService(),
): Promise<DispatchOutcome | undefined> {
  const traceText = captureStartupTrace(failure);
  const event = createFailureEvent({
    failure,
    kind: 'error',
    traceText,
    tenantId: config.boardId,
    location: locateSourceFrame(traceText),
    ...STARTUP_REQUEST_METADATA,
  });

  logger.error({
    message: `Application failed to start: ${event.rawMessage}`,
    module: 'crash-reporting',
    file: event.sourceFile ?? null,
    line: event.sourceLine ?? null,
  });

  if (!config.endpointUrl) {
    return undefined;
  }
  return dispatcher.dispatch(config.endpointUrl, encodeFailureReport(event));
}
