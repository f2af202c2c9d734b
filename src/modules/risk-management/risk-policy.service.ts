import { Injectable } from '@nestjs/common';
import { JournalConfigService } from '../../common/config/journal-config.service';
import { ValidationError, JOURNAL_ERROR_CODES } from '../../common/errors';
import type {
  CheckTradeInput,
  RiskSizing,
  TradingSession,
} from '../../common/types/risk.type';
import {
  TRADE_MODES,
  type CloseTradeInput,
  type OpenTradeInput,
} from '../../common/types/trade.type';
import {
  FinancialDecimal,
  FinancialMath,
} from '../../common/utils/financial-math';

export type SizingInput = Pick<
  CheckTradeInput,
  'accountEquity' | 'intendedRiskPct' | 'stopDistancePct'
>;

function isPositive(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

/**
 * Per-trade risk limits: request validation against the configured bounds
 * and position sizing. Violation messages use the wire field names.
 */
@Injectable()
export class RiskPolicyService {
  constructor(private readonly journalConfig: JournalConfigService) {}

  validateCheckInput(input: CheckTradeInput): void {
    const { maxStopDistancePct } = this.journalConfig.getLimits();
    const violations = [
      ...this.requireText({
        user_id: input.userId,
        symbol: input.symbol,
        strategy: input.strategy,
        timeframe: input.timeframe,
      }),
    ];

    if (!isPositive(input.accountEquity)) {
      violations.push('account_equity must be greater than 0');
    }
    if (!isPositive(input.intendedRiskPct) || input.intendedRiskPct > 100) {
      violations.push('intended_risk_pct must be in (0, 100]');
    }
    if (
      !isPositive(input.stopDistancePct) ||
      input.stopDistancePct > maxStopDistancePct
    ) {
      violations.push(
        `stop_distance_pct must be in (0, ${maxStopDistancePct}]`,
      );
    }

    this.throwIfAny(violations);
  }

  validateOpenInput(input: OpenTradeInput): void {
    const limits = this.journalConfig.getLimits();
    const violations = [
      ...this.requireText({
        user_id: input.userId,
        symbol: input.symbol,
        strategy: input.strategy,
      }),
    ];

    if (!isPositive(input.entryPrice)) {
      violations.push('entry_price must be greater than 0');
    }
    if (!isPositive(input.qty)) {
      violations.push('qty must be greater than 0');
    }
    if (!isPositive(input.riskPct) || input.riskPct > limits.maxRiskPct) {
      violations.push(`risk_pct must be in (0, ${limits.maxRiskPct}]`);
    }
    if (
      !isPositive(input.stopDistancePct) ||
      input.stopDistancePct > limits.maxStopDistancePct
    ) {
      violations.push(
        `stop_distance_pct must be in (0, ${limits.maxStopDistancePct}]`,
      );
    }
    if (!TRADE_MODES.includes(input.mode)) {
      violations.push(`mode must be one of ${TRADE_MODES.join(', ')}`);
    }

    this.throwIfAny(violations);

    if (input.mode === 'LIVE' && !limits.allowLive) {
      throw new ValidationError(
        'LIVE mode is disabled; only PAPER trades can be journaled',
        ['mode LIVE is not allowed'],
        JOURNAL_ERROR_CODES.LIVE_MODE_DISABLED,
      );
    }
  }

  validateCloseInput(input: CloseTradeInput): void {
    const violations = [
      ...this.requireText({ user_id: input.userId, trade_id: input.tradeId }),
    ];

    if (!isPositive(input.exitPrice)) {
      violations.push('exit_price must be greater than 0');
    }
    if (typeof input.pnl !== 'number' || !Number.isFinite(input.pnl)) {
      violations.push('pnl must be a finite number');
    }
    if (
      input.rr !== undefined &&
      input.rr !== null &&
      !Number.isFinite(input.rr)
    ) {
      violations.push('rr must be a finite number');
    }

    this.throwIfAny(violations);
  }

  /**
   * Sizes a trade from the intended risk, capped at the configured maximum
   * and scaled by the session's risk multiplier. The stop distance used for
   * the notional never goes below the configured minimum.
   */
  size(input: SizingInput, session: TradingSession): RiskSizing {
    const limits = this.journalConfig.getLimits();
    const equity = new FinancialDecimal(input.accountEquity);
    const intendedRiskPct = new FinancialDecimal(input.intendedRiskPct);
    const maxRiskPct = new FinancialDecimal(limits.maxRiskPct);
    const reasons: string[] = [];

    const riskAmountUsd = FinancialMath.riskAmount(equity, intendedRiskPct);

    const capped = intendedRiskPct.gt(maxRiskPct);
    const cappedRiskPct = capped ? maxRiskPct : intendedRiskPct;
    if (capped) {
      reasons.push(
        `Risk capped to ${maxRiskPct.toFixed(2)}% (max risk per trade).`,
      );
    }

    const finalRiskPct = cappedRiskPct.mul(session.riskMultiplier);
    if (session.riskMultiplier < 1) {
      reasons.push(
        `${session.name} session: risk scaled by ${session.riskMultiplier} to ${finalRiskPct.toFixed(2)}%.`,
      );
    }

    const maxLossUsd = FinancialMath.riskAmount(equity, finalRiskPct);
    const effectiveStopPct = FinancialDecimal.max(
      new FinancialDecimal(input.stopDistancePct),
      new FinancialDecimal(limits.minStopDistancePct),
    );
    const positionSizeUsd = FinancialMath.positionSize(
      maxLossUsd,
      effectiveStopPct,
    );

    return {
      riskAmountUsd,
      cappedRiskPct,
      finalRiskPct,
      maxLossUsd,
      positionSizeUsd,
      capped,
      reasons,
    };
  }

  private requireText(fields: Record<string, unknown>): string[] {
    return Object.entries(fields)
      .filter(([, value]) => isBlank(value))
      .map(([name]) => `${name} must not be empty`);
  }

  private throwIfAny(violations: string[]): void {
    if (violations.length > 0) {
      throw new ValidationError(violations.join('; '), violations);
    }
  }
}
