import {
  Injectable,
  Logger,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import { SystemError } from '../errors/system-error';

/**
 * Renders deliberately raised SystemErrors. Not registered on its own:
 * PanicRecoveryFilter is the single global filter and delegates here.
 */
@Injectable()
export class SystemErrorFilter implements ExceptionFilter<SystemError> {
  private readonly logger = new Logger(SystemErrorFilter.name);

  catch(exception: SystemError, host: ArgumentsHost): void {
    // Structured log with full error context
    this.logger.error({
      message: exception.message,
      code: exception.code,
      severity: exception.severity,
      component:
        'component' in exception && typeof exception.component === 'string'
          ? exception.component
          : undefined,
      metadata: exception.metadata,
      module: 'system-error-filter',
      stack: exception.stack,
    });

    // Only build HTTP response for HTTP contexts
    if (host.getType() !== 'http') {
      return;
    }

    const ctx = host.switchToHttp();
    const response: {
      status: (code: number) => { send: (body: unknown) => void };
    } = ctx.getResponse();

    // 'critical' | 'error' → 500, 'warning' → 400
    const statusCode = exception.severity === 'warning' ? 400 : 500;

    const errorResponse = {
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
    };

    // Fastify response
    void response.status(statusCode).send(errorResponse);
  }
}
