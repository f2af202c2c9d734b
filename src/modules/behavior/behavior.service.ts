import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { EntityManager } from 'typeorm';
import { JournalConfigService } from '../../common/config/journal-config.service';
import { CooldownStartedEvent, EVENT_NAMES } from '../../common/events';
import type { BehaviorCheck } from '../../common/types/risk.type';
import { FinancialDecimal } from '../../common/utils/financial-math';
import { utcDay } from '../../common/utils/utc-date';
import { DailyStatRepository } from '../../persistence/repositories/daily-stat.repository';
import type { DailyStatEntity } from '../../persistence/entities/daily-stat.entity';

export interface TradeCloseOutcome {
  stat: DailyStatEntity;
  cooldownStarted: boolean;
}

/**
 * Discipline guardrails backed by the per-day stats: a cooldown after a
 * losing streak and a cap on trades per UTC day.
 */
@Injectable()
export class BehaviorService {
  private readonly logger = new Logger(BehaviorService.name);

  constructor(
    private readonly dailyStats: DailyStatRepository,
    private readonly journalConfig: JournalConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async check(userId: string, now: Date): Promise<BehaviorCheck> {
    const { maxTradesPerDay } = this.journalConfig.getLimits();
    // A long cooldown can outlive the day it started on.
    const [cooldownRow, todayRow] = await Promise.all([
      this.dailyStats.findActiveCooldown(userId, now),
      this.dailyStats.findByUserAndDay(userId, utcDay(now)),
    ]);

    const until = cooldownRow?.cooldownUntil;
    const cooldownUntil = until && until > now ? until : null;

    if (cooldownUntil) {
      return {
        allowed: false,
        reasons: [`Cooldown active until ${cooldownUntil.toISOString()}.`],
        suggestedActions: [
          'Step away until the cooldown ends and review the losing trades.',
        ],
        cooldownUntil,
      };
    }

    if (todayRow && todayRow.tradesCount >= maxTradesPerDay) {
      return {
        allowed: false,
        reasons: [
          `Max trades per day reached (${todayRow.tradesCount}/${maxTradesPerDay}).`,
        ],
        suggestedActions: ['Stop for today and journal what worked.'],
        cooldownUntil: null,
      };
    }

    return {
      allowed: true,
      reasons: [],
      suggestedActions: [],
      cooldownUntil: null,
    };
  }

  /**
   * Books a closed trade on the UTC day it closed. A positive P&L is a win
   * and resets the streak; anything else extends it. Runs inside the close
   * transaction when given its manager, so nothing is announced here.
   */
  async recordTradeClose(
    userId: string,
    pnl: number,
    closedAt: Date,
    manager?: EntityManager,
  ): Promise<TradeCloseOutcome> {
    const { cooldownLossStreak, cooldownMinutes } =
      this.journalConfig.getLimits();
    const stat = await this.dailyStats.getOrInit(
      userId,
      utcDay(closedAt),
      manager,
    );

    stat.tradesCount += 1;
    stat.realizedPnl = new FinancialDecimal(stat.realizedPnl)
      .plus(pnl)
      .toNumber();
    if (pnl > 0) {
      stat.wins += 1;
      stat.consecutiveLosses = 0;
    } else {
      stat.losses += 1;
      stat.consecutiveLosses += 1;
    }

    const cooldownStarted = stat.consecutiveLosses >= cooldownLossStreak;
    if (cooldownStarted) {
      stat.cooldownUntil = new Date(
        closedAt.getTime() + cooldownMinutes * 60_000,
      );
    }

    const saved = await this.dailyStats.save(stat, manager);
    return { stat: saved, cooldownStarted };
  }

  /** Call once the close has committed. */
  announceCooldown(userId: string, stat: DailyStatEntity): void {
    if (!stat.cooldownUntil) return;

    this.logger.warn({
      message: 'Losing streak reached, cooldown started',
      data: {
        userId,
        consecutiveLosses: stat.consecutiveLosses,
        cooldownUntil: stat.cooldownUntil.toISOString(),
      },
    });
    this.eventEmitter.emit(
      EVENT_NAMES.COOLDOWN_STARTED,
      new CooldownStartedEvent(
        userId,
        stat.consecutiveLosses,
        stat.cooldownUntil,
      ),
    );
  }
}
