import {
  Catch,
  HttpException,
  Inject,
  Logger,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  CRASH_REPORTING_CONFIG,
  type CrashReportingConfig,
} from '../../common/config/crash-reporting.config';
import { SystemError } from '../../common/errors';
import { SystemErrorFilter } from '../../common/filters/system-error.filter';
import { GENERIC_FAILURE_MESSAGE } from './crash-reporting.constants';
import { createFailureEvent, describeFailure } from './failure-event.factory';
import { encodeFailureReport } from './report-encoder';
import { ReportDispatcherService } from './report-dispatcher.service';
import { resolveTenantId } from './tenant-resolver';
import { captureRecoveryTrace } from './trace-capture';
import { locateSourceFrame } from './trace-locator';
import type { FailureEvent } from './types';

/**
 * Fastify's own request errors (malformed body, oversized payload). They
 * carry a `FST_` code and a 4xx status; application errors with a 4xx
 * `statusCode` are still unexpected failures.
 */
function isFastifyClientError(
  exception: unknown,
): exception is Error & { statusCode: number } {
  return (
    exception instanceof Error &&
    'code' in exception &&
    typeof exception.code === 'string' &&
    exception.code.startsWith('FST_') &&
    'statusCode' in exception &&
    typeof exception.statusCode === 'number' &&
    exception.statusCode >= 400 &&
    exception.statusCode < 500
  );
}

/**
 * Outermost boundary of every request. Deliberate errors (HttpException,
 * SystemError, Fastify 4xx errors) get their usual responses; anything else
 * is an unexpected failure: it is described, reported in the background when
 * an endpoint is configured, and answered with a generic 500. Trace, file and
 * line never reach the caller.
 */
@Catch()
export class PanicRecoveryFilter implements ExceptionFilter {
  private readonly logger = new Logger(PanicRecoveryFilter.name);

  constructor(
    @Inject(CRASH_REPORTING_CONFIG)
    private readonly config: CrashReportingConfig,
    private readonly dispatcher: ReportDispatcherService,
    private readonly systemErrorFilter: SystemErrorFilter,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    if (exception instanceof SystemError) {
      this.systemErrorFilter.catch(exception, host);
      return;
    }

    if (host.getType() !== 'http') {
      this.logger.error({
        message: 'Unexpected failure outside HTTP handling',
        module: 'crash-reporting',
        contextType: host.getType(),
        error: describeFailure(exception),
      });
      return;
    }

    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();

    if (exception instanceof HttpException) {
      this.replyHttpException(exception, reply);
      return;
    }

    if (isFastifyClientError(exception)) {
      void reply.status(exception.statusCode).send({
        statusCode: exception.statusCode,
        message: exception.message,
      });
      return;
    }

    const request = ctx.getRequest<FastifyRequest>();
    const message = describeFailure(exception);
    try {
      this.report(this.describe(exception, request));
    } catch (reportingError) {
      this.logger.error({
        message: 'Failed to build crash report',
        module: 'crash-reporting',
        error:
          reportingError instanceof Error
            ? reportingError.message
            : String(reportingError),
      });
    }

    if (reply.sent) {
      this.logger.warn({
        message: 'Response already sent; recovered failure not answered',
        module: 'crash-reporting',
      });
      return;
    }

    void reply.status(500).send({ error: GENERIC_FAILURE_MESSAGE, message });
  }

  private describe(
    exception: unknown,
    request: FastifyRequest,
  ): FailureEvent {
    const traceText = captureRecoveryTrace(exception);
    const tenantId = resolveTenantId(
      { query: request.query, headers: request.headers, host: request.hostname },
      this.config,
    );
    const userAgent = request.headers['user-agent'];
    const [requestPath = '/'] = request.url.split('?');

    const event = createFailureEvent({
      failure: exception,
      kind: 'panic',
      traceText,
      tenantId,
      location: locateSourceFrame(traceText),
      requestPath,
      requestMethod: request.method,
      userAgent: typeof userAgent === 'string' ? userAgent : '',
    });

    this.logger.error({
      message: `Recovered from unexpected failure: ${event.rawMessage}`,
      module: 'crash-reporting',
      boardId: event.tenantId ?? null,
      file: event.sourceFile ?? null,
      line: event.sourceLine ?? null,
      requestPath: event.requestPath,
      requestMethod: event.requestMethod,
    });
    return event;
  }

  private report(event: FailureEvent): void {
    if (!this.config.endpointUrl) {
      this.logger.log({
        message:
          'RUNTIME_ERROR_ENDPOINT_URL is not set - skipping error reporting',
        module: 'crash-reporting',
      });
      return;
    }
    this.logger.log({
      message: 'Sending crash report',
      module: 'crash-reporting',
      endpointUrl: this.config.endpointUrl,
    });
    this.dispatcher.launch(this.config.endpointUrl, encodeFailureReport(event));
  }

  /** Same body Nest's BaseExceptionFilter sends for an HttpException. */
  private replyHttpException(
    exception: HttpException,
    reply: FastifyReply,
  ): void {
    const status = exception.getStatus();
    const body = exception.getResponse();
    void reply
      .status(status)
      .send(
        typeof body === 'string' ? { statusCode: status, message: body } : body,
      );
  }
}
