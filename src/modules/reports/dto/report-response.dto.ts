import { ApiProperty } from '@nestjs/swagger';
import type {
  DailyReport,
  WeeklyReport,
} from '../../../common/types/report.type';

export class DailyReportDto {
  @ApiProperty({ example: '2026-03-02' })
  day!: string;

  @ApiProperty()
  trades!: number;

  @ApiProperty()
  wins!: number;

  @ApiProperty()
  losses!: number;

  @ApiProperty({ description: 'Realized P&L in USD' })
  realized_pnl!: number;

  @ApiProperty()
  consecutive_losses!: number;

  @ApiProperty({ type: String, nullable: true, description: 'ISO 8601' })
  cooldown_until!: string | null;
}

export class WeeklyReportDto {
  @ApiProperty({ example: '2026-02-24' })
  start_day!: string;

  @ApiProperty({ example: '2026-03-02' })
  end_day!: string;

  @ApiProperty()
  trades!: number;

  @ApiProperty()
  wins!: number;

  @ApiProperty()
  losses!: number;

  @ApiProperty()
  realized_pnl!: number;

  @ApiProperty({ description: 'Longest losing streak recorded on any day' })
  max_consecutive_losses!: number;
}

export class DailyReportResponseDto {
  @ApiProperty({ type: DailyReportDto })
  data!: DailyReportDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class WeeklyReportResponseDto {
  @ApiProperty({ type: WeeklyReportDto })
  data!: WeeklyReportDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export function toDailyReportDto(report: DailyReport): DailyReportDto {
  return {
    day: report.day,
    trades: report.trades,
    wins: report.wins,
    losses: report.losses,
    realized_pnl: report.realizedPnl,
    consecutive_losses: report.consecutiveLosses,
    cooldown_until: report.cooldownUntil,
  };
}

export function toWeeklyReportDto(report: WeeklyReport): WeeklyReportDto {
  return {
    start_day: report.startDay,
    end_day: report.endDay,
    trades: report.trades,
    wins: report.wins,
    losses: report.losses,
    realized_pnl: report.realizedPnl,
    max_consecutive_losses: report.maxConsecutiveLosses,
  };
}
