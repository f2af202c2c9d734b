import { Injectable } from '@nestjs/common';
import { DataSource, QueryFailedError } from 'typeorm';
import {
  EventMetricsDto,
  HealthCheckResponseDto,
} from './common/dto/health-check-response.dto';
import {
  SystemHealthError,
  SYSTEM_HEALTH_ERROR_CODES,
} from './common/errors/system-health-error';
import { EventConsumerService } from './modules/monitoring/event-consumer.service';

@Injectable()
export class AppService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly eventConsumer: EventConsumerService,
  ) {}

  async getHealth(): Promise<HealthCheckResponseDto> {
    try {
      await this.dataSource.query('SELECT 1');

      return {
        data: {
          status: 'ok',
          service: 'trading-journal-backend',
          events: this.eventMetrics(),
        },
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      if (error instanceof QueryFailedError) {
        throw new SystemHealthError(
          SYSTEM_HEALTH_ERROR_CODES.DATABASE_QUERY_FAILED,
          `Database query failed: ${error.message}`,
          'critical',
          'database',
        );
      }
      throw new SystemHealthError(
        SYSTEM_HEALTH_ERROR_CODES.DATABASE_FAILURE,
        'Database connection failed',
        'critical',
        'database',
        { cause: error instanceof Error ? error.message : String(error) },
      );
    }
  }

  private eventMetrics(): EventMetricsDto {
    const metrics = this.eventConsumer.getMetrics();
    return {
      total_events_processed: metrics.totalEventsProcessed,
      event_counts: metrics.eventCounts,
      severity_counts: metrics.severityCounts,
      errors_count: metrics.errorsCount,
      last_event_at: metrics.lastEventTimestamp?.toISOString() ?? null,
    };
  }
}
