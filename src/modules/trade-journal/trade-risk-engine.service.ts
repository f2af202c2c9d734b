import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DataSource } from 'typeorm';
import type { ITradeRiskEngine } from '../../common/interfaces/trade-risk-engine.interface';
import {
  DuplicateError,
  NotFoundError,
  ValidationError,
} from '../../common/errors';
import {
  EVENT_NAMES,
  TradeCheckBlockedEvent,
  TradeClosedEvent,
  TradeOpenedEvent,
} from '../../common/events';
import { withCorrelationId } from '../../common/services/correlation-context';
import type {
  CheckDecision,
  CheckTradeInput,
  CheckTradeResult,
} from '../../common/types/risk.type';
import {
  TRADE_STATUS,
  type CloseTradeInput,
  type OpenTradeInput,
  type Trade,
  type TradeCloseFields,
} from '../../common/types/trade.type';
import { daysAgo } from '../../common/utils/utc-date';
import { TradeRepository } from '../../persistence/repositories/trade.repository';
import { BehaviorService } from '../behavior/behavior.service';
import { RiskPolicyService } from '../risk-management/risk-policy.service';
import { SessionService } from '../session/session.service';
import { TradeLockService } from './trade-lock.service';

export const MAX_LIST_DAYS = 365;

function normalizeNotes(notes: string | null | undefined): string | null {
  const trimmed = notes?.trim();
  return trimmed ? trimmed : null;
}

/** Close notes go on a new line after whatever was written at open. */
export function mergeNotes(
  existing: string | null,
  addition: string | null | undefined,
): string | null {
  const extra = normalizeNotes(addition);
  if (!extra) return existing;
  return existing ? `${existing}\n${extra}` : extra;
}

/**
 * Pre-trade risk checks and the OPEN → CLOSED trade lifecycle.
 * Open and close for one user are serialized by TradeLockService. Close is
 * additionally guarded by a conditional update so it can only succeed once,
 * and commits the trade and its daily stats in one transaction.
 */
@Injectable()
export class TradeRiskEngineService implements ITradeRiskEngine {
  private readonly logger = new Logger(TradeRiskEngineService.name);

  constructor(
    private readonly riskPolicy: RiskPolicyService,
    private readonly behaviorService: BehaviorService,
    private readonly sessionService: SessionService,
    private readonly tradeRepository: TradeRepository,
    private readonly tradeLock: TradeLockService,
    private readonly eventEmitter: EventEmitter2,
    private readonly dataSource: DataSource,
  ) {}

  async checkTrade(input: CheckTradeInput): Promise<CheckTradeResult> {
    return withCorrelationId(async () => {
      this.riskPolicy.validateCheckInput(input);

      const now = new Date();
      const session = this.sessionService.detect(now);
      const sizing = this.riskPolicy.size(input, session);
      const behavior = await this.behaviorService.check(input.userId, now);

      let decision: CheckDecision;
      let reasons: string[];
      let suggestedActions: string[];
      if (!behavior.allowed) {
        decision = 'BLOCK';
        reasons = [...behavior.reasons, ...sizing.reasons];
        suggestedActions = [
          ...behavior.suggestedActions,
          'Switch to paper review until the guardrail clears.',
        ];
      } else if (sizing.capped) {
        decision = 'WARN';
        reasons = sizing.reasons;
        suggestedActions = [
          'Reduce position size to stay inside the per-trade risk cap.',
        ];
      } else {
        decision = 'ALLOW';
        reasons = sizing.reasons;
        suggestedActions = [
          'Proceed only if the setup matches your plan and the stop is placed.',
        ];
      }

      const result: CheckTradeResult = {
        allowed: decision !== 'BLOCK',
        decision,
        ...(decision !== 'ALLOW' && reasons.length > 0
          ? { reason: reasons[0] }
          : {}),
        reasons,
        suggestedActions,
        riskAmountUsd: sizing.riskAmountUsd.toDecimalPlaces(2).toNumber(),
        riskPct: sizing.finalRiskPct.toDecimalPlaces(4).toNumber(),
        maxLossUsd: sizing.maxLossUsd.toDecimalPlaces(2).toNumber(),
        positionSizeUsd: sizing.positionSizeUsd.toDecimalPlaces(2).toNumber(),
        session,
      };

      this.logger.log({
        message: 'Trade check evaluated',
        data: {
          userId: input.userId,
          symbol: input.symbol,
          timeframe: input.timeframe,
          decision,
          riskPct: result.riskPct,
          session: session.name,
        },
      });

      if (decision === 'BLOCK') {
        this.eventEmitter.emit(
          EVENT_NAMES.TRADE_CHECK_BLOCKED,
          new TradeCheckBlockedEvent(
            input.userId,
            input.symbol,
            input.strategy,
            reasons,
          ),
        );
      }

      return result;
    });
  }

  async openTrade(input: OpenTradeInput): Promise<Trade> {
    return withCorrelationId(async () => {
      this.riskPolicy.validateOpenInput(input);
      const symbol = input.symbol.trim().toUpperCase();

      return this.tradeLock.runExclusive(input.userId, async () => {
        const existing = await this.tradeRepository.findOpenBySymbol(
          input.userId,
          symbol,
          input.mode,
        );
        if (existing) {
          throw new DuplicateError(
            `An OPEN ${input.mode} trade on ${symbol} already exists`,
            existing.id,
          );
        }

        const trade = await this.tradeRepository.create({
          userId: input.userId,
          symbol,
          strategy: input.strategy.trim(),
          mode: input.mode,
          status: TRADE_STATUS.OPEN,
          openedAt: new Date(),
          closedAt: null,
          entryPrice: input.entryPrice,
          exitPrice: null,
          qty: input.qty,
          riskPct: input.riskPct,
          stopDistancePct: input.stopDistancePct,
          pnl: null,
          rr: null,
          ruleViolation: false,
          notes: normalizeNotes(input.notes),
        });

        this.logger.log({
          message: 'Trade opened',
          data: {
            tradeId: trade.id,
            userId: trade.userId,
            symbol: trade.symbol,
            mode: trade.mode,
          },
        });
        this.eventEmitter.emit(
          EVENT_NAMES.TRADE_OPENED,
          new TradeOpenedEvent(
            trade.id,
            trade.userId,
            trade.symbol,
            trade.strategy,
            trade.mode,
            trade.entryPrice,
            trade.qty,
            trade.riskPct,
          ),
        );

        return trade;
      });
    });
  }

  async closeTrade(input: CloseTradeInput): Promise<Trade> {
    return withCorrelationId(async () => {
      this.riskPolicy.validateCloseInput(input);

      return this.tradeLock.runExclusive(input.userId, async () => {
        const notFound = new NotFoundError(
          `No OPEN trade ${input.tradeId} for this user`,
          input.tradeId,
        );

        const trade = await this.tradeRepository.findOwned(
          input.tradeId,
          input.userId,
        );
        if (!trade || trade.status !== TRADE_STATUS.OPEN) {
          throw notFound;
        }

        const fields: TradeCloseFields = {
          closedAt: new Date(),
          exitPrice: input.exitPrice,
          pnl: input.pnl,
          rr: input.rr ?? null,
          ruleViolation: input.ruleViolation ?? false,
          notes: mergeNotes(trade.notes, input.notes),
        };

        const { stat, cooldownStarted } = await this.dataSource.transaction(
          async (manager) => {
            const closed = await this.tradeRepository.closeIfOpen(
              trade.id,
              input.userId,
              fields,
              manager,
            );
            if (!closed) {
              throw notFound;
            }
            return this.behaviorService.recordTradeClose(
              input.userId,
              input.pnl,
              fields.closedAt,
              manager,
            );
          },
        );

        const closedTrade: Trade = {
          ...trade,
          ...fields,
          status: TRADE_STATUS.CLOSED,
        };

        this.logger.log({
          message: 'Trade closed',
          data: {
            tradeId: closedTrade.id,
            userId: closedTrade.userId,
            pnl: closedTrade.pnl,
            ruleViolation: closedTrade.ruleViolation,
            cooldownStarted,
          },
        });
        this.eventEmitter.emit(
          EVENT_NAMES.TRADE_CLOSED,
          new TradeClosedEvent(
            closedTrade.id,
            closedTrade.userId,
            closedTrade.symbol,
            input.exitPrice,
            input.pnl,
            fields.rr,
            fields.ruleViolation,
          ),
        );
        if (cooldownStarted) {
          this.behaviorService.announceCooldown(input.userId, stat);
        }

        return closedTrade;
      });
    });
  }

  async listTrades(userId: string, days: number): Promise<Trade[]> {
    const violations: string[] = [];
    if (typeof userId !== 'string' || userId.trim().length === 0) {
      violations.push('user_id must not be empty');
    }
    if (!Number.isInteger(days) || days < 1 || days > MAX_LIST_DAYS) {
      violations.push(`days must be an integer in [1, ${MAX_LIST_DAYS}]`);
    }
    if (violations.length > 0) {
      throw new ValidationError(violations.join('; '), violations);
    }

    return this.tradeRepository.findOpenedSince(
      userId,
      daysAgo(new Date(), days),
    );
  }
}
