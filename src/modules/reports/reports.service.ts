import { Injectable } from '@nestjs/common';
import type { DailyReport, WeeklyReport } from '../../common/types/report.type';
import { FinancialMath } from '../../common/utils/financial-math';
import { utcDay, utcDayOffset } from '../../common/utils/utc-date';
import { DailyStatRepository } from '../../persistence/repositories/daily-stat.repository';

const WEEK_DAYS = 7;

/** Read-only P&L summaries over the per-day stats. Reads never create rows. */
@Injectable()
export class ReportsService {
  constructor(private readonly dailyStats: DailyStatRepository) {}

  async daily(userId: string, now: Date): Promise<DailyReport> {
    const day = utcDay(now);
    const stat = await this.dailyStats.findByUserAndDay(userId, day);

    return {
      day,
      trades: stat?.tradesCount ?? 0,
      wins: stat?.wins ?? 0,
      losses: stat?.losses ?? 0,
      realizedPnl: stat?.realizedPnl ?? 0,
      consecutiveLosses: stat?.consecutiveLosses ?? 0,
      cooldownUntil: stat?.cooldownUntil?.toISOString() ?? null,
    };
  }

  /** The seven UTC days ending today, inclusive. */
  async weekly(userId: string, now: Date): Promise<WeeklyReport> {
    const endDay = utcDay(now);
    const startDay = utcDayOffset(now, WEEK_DAYS - 1);
    const rows = await this.dailyStats.findByDayRange(
      userId,
      startDay,
      endDay,
    );

    return {
      startDay,
      endDay,
      trades: rows.reduce((total, row) => total + row.tradesCount, 0),
      wins: rows.reduce((total, row) => total + row.wins, 0),
      losses: rows.reduce((total, row) => total + row.losses, 0),
      realizedPnl: FinancialMath.sum(
        rows.map((row) => row.realizedPnl),
      ).toNumber(),
      maxConsecutiveLosses: rows.reduce(
        (max, row) => Math.max(max, row.consecutiveLosses),
        0,
      ),
    };
  }
}
