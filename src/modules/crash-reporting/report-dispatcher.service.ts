import {
  Injectable,
  Logger,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { DISPATCH_TIMEOUT_MS } from './crash-reporting.constants';
import type { DispatchOutcome } from './types';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Delivers encoded failure reports to the telemetry endpoint.
 * One POST per report, bounded by DISPATCH_TIMEOUT_MS, never retried.
 * Every failure is logged here and goes no further.
 *
 * In-flight reports are not capped: a failure storm opens one request per
 * failure.
 */
@Injectable()
export class ReportDispatcherService implements OnApplicationShutdown {
  private readonly logger = new Logger(ReportDispatcherService.name);
  private readonly inFlight = new Set<Promise<DispatchOutcome>>();

  /** Fire-and-forget: starts a dispatch and returns immediately. */
  launch(endpointUrl: string, payload: string): void {
    const pending = this.dispatch(endpointUrl, payload);
    this.inFlight.add(pending);
    void pending.finally(() => this.inFlight.delete(pending));
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every launched dispatch has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log({
        message: `Waiting for ${this.inFlight.size} crash report(s) before shutdown`,
        module: 'crash-reporting',
      });
    }
    await this.drain();
  }

  /** Single POST attempt. Never rejects. */
  async dispatch(
    endpointUrl: string,
    payload: string,
  ): Promise<DispatchOutcome> {
    if (!URL.canParse(endpointUrl)) {
      this.logger.error({
        message: 'Failed to create crash report request: invalid endpoint URL',
        module: 'crash-reporting',
        endpointUrl,
      });
      return 'failed';
    }

    let response: Response;
    try {
      response = await fetch(endpointUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: payload,
        signal: AbortSignal.timeout(DISPATCH_TIMEOUT_MS),
      });
    } catch (error) {
      this.logger.error({
        message: 'Failed to send crash report',
        module: 'crash-reporting',
        endpointUrl,
        timedOut: error instanceof Error && error.name === 'TimeoutError',
        error: errorMessage(error),
      });
      return 'failed';
    }

    if (response.status !== 200) {
      this.logger.warn({
        message: `Crash report endpoint responded ${response.status}`,
        module: 'crash-reporting',
        status: response.status,
        body: await this.readBody(response),
      });
      return 'rejected';
    }

    this.logger.log({
      message: `Crash report endpoint responded ${response.status}`,
      module: 'crash-reporting',
      status: response.status,
    });
    await this.discardBody(response);
    return 'delivered';
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      return `<unreadable body: ${errorMessage(error)}>`;
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug({
        message: 'Failed to release crash report response body',
        module: 'crash-reporting',
        error: errorMessage(error),
      });
    }
  }
}
