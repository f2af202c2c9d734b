import {
  Catch,
  type ExceptionFilter,
  type ArgumentsHost,
  Logger,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SystemError } from '../errors/system-error';
import { JournalError } from '../errors/journal-error';
import { SystemHealthError } from '../errors/system-health-error';
import { SystemHealthCriticalEvent } from '../events/system.events';
import { EVENT_NAMES } from '../events/event-catalog';

/** Minimal Fastify reply interface, without a direct fastify dependency. */
interface Reply {
  status(code: number): { send(body: unknown): void };
}

@Catch(SystemError)
export class SystemErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(SystemErrorFilter.name);
  private emitting = false;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  catch(exception: SystemError, host: ArgumentsHost): void {
    const component =
      exception instanceof SystemHealthError ? exception.component : undefined;
    const logEntry = {
      message: exception.message,
      code: exception.code,
      severity: exception.severity,
      component,
      metadata: exception.metadata,
      module: 'system-error-filter',
    };

    // Caller mistakes are expected traffic; log them without a stack
    if (exception.severity === 'warning') {
      this.logger.warn(logEntry);
    } else {
      this.logger.error({ ...logEntry, stack: exception.stack });
    }

    // Re-entrancy guard prevents infinite loops (filter → emit → handler fails → filter catches → emit again)
    if (exception.severity === 'critical' && !this.emitting) {
      this.emitting = true;
      try {
        this.eventEmitter.emit(
          EVENT_NAMES.SYSTEM_HEALTH_CRITICAL,
          new SystemHealthCriticalEvent(
            component ?? 'unknown',
            `Unhandled SystemError: ${exception.message} (code: ${exception.code})`,
            ['Check error logs', 'Investigate root cause'],
            'critical',
          ),
        );
      } finally {
        this.emitting = false;
      }
    }

    if (host.getType() !== 'http') {
      return;
    }

    const response = host.switchToHttp().getResponse<Reply>();

    const statusCode =
      exception instanceof JournalError
        ? exception.httpStatus
        : exception.severity === 'warning'
          ? 400
          : 500;

    response.status(statusCode).send({
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
