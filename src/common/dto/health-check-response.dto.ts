import { ApiProperty } from '@nestjs/swagger';

export class EventMetricsDto {
  @ApiProperty({ example: 12 })
  total_events_processed!: number;

  @ApiProperty({
    description: 'Events seen per event name',
    example: { 'journal.trade.opened': 7, 'journal.trade.closed': 5 },
  })
  event_counts!: Record<string, number>;

  @ApiProperty({ example: { critical: 0, warning: 1, info: 11 } })
  severity_counts!: Record<string, number>;

  @ApiProperty({ example: 0 })
  errors_count!: number;

  @ApiProperty({ nullable: true, type: String })
  last_event_at!: string | null;
}

export class HealthStatusDto {
  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ example: 'trading-journal-backend' })
  service!: string;

  @ApiProperty({ type: EventMetricsDto })
  events!: EventMetricsDto;
}

export class HealthCheckResponseDto {
  @ApiProperty({ type: HealthStatusDto })
  data!: HealthStatusDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}
