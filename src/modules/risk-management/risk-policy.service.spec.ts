import { describe, it, expect } from 'vitest';
import { RiskPolicyService } from './risk-policy.service';
import {
  ValidationError,
  JOURNAL_ERROR_CODES,
} from '../../common/errors/journal-error';
import type { CheckTradeInput } from '../../common/types/risk.type';
import type {
  CloseTradeInput,
  OpenTradeInput,
} from '../../common/types/trade.type';
import {
  ASIA_SESSION,
  US_SESSION,
  createJournalConfig,
} from '../../test/mock-factories';

const checkInput = (
  overrides: Partial<CheckTradeInput> = {},
): CheckTradeInput => ({
  userId: 'user-1',
  symbol: 'BTCUSDT',
  strategy: 'breakout',
  accountEquity: 1000,
  intendedRiskPct: 1.0,
  stopDistancePct: 1.0,
  timeframe: '5m',
  ...overrides,
});

const openInput = (
  overrides: Partial<OpenTradeInput> = {},
): OpenTradeInput => ({
  userId: 'user-1',
  symbol: 'BTCUSDT',
  strategy: 'breakout',
  entryPrice: 50000,
  qty: 0.01,
  riskPct: 1,
  stopDistancePct: 1.5,
  mode: 'PAPER',
  ...overrides,
});

const closeInput = (
  overrides: Partial<CloseTradeInput> = {},
): CloseTradeInput => ({
  userId: 'user-1',
  tradeId: 'trade-1',
  exitPrice: 51000,
  pnl: 10,
  ...overrides,
});

function captureViolations(fn: () => void): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('RiskPolicyService', () => {
  const policy = new RiskPolicyService(createJournalConfig());

  describe('size', () => {
    it('should put equity × risk / 100 at risk', () => {
      const sizing = policy.size(checkInput(), US_SESSION);

      expect(sizing.riskAmountUsd.toNumber()).toBe(10);
      expect(sizing.maxLossUsd.toNumber()).toBe(10);
      expect(sizing.positionSizeUsd.toNumber()).toBe(1000);
      expect(sizing.capped).toBe(false);
      expect(sizing.reasons).toEqual([]);
    });

    it('should cap risk above the configured maximum', () => {
      const sizing = policy.size(
        checkInput({
          accountEquity: 10000,
          intendedRiskPct: 5,
          stopDistancePct: 2,
        }),
        US_SESSION,
      );

      expect(sizing.riskAmountUsd.toNumber()).toBe(500);
      expect(sizing.capped).toBe(true);
      expect(sizing.cappedRiskPct.toNumber()).toBe(2);
      expect(sizing.maxLossUsd.toNumber()).toBe(200);
      expect(sizing.positionSizeUsd.toNumber()).toBe(10000);
      expect(sizing.reasons).toEqual([
        'Risk capped to 2.00% (max risk per trade).',
      ]);
    });

    it('should scale risk by the session multiplier', () => {
      const sizing = policy.size(
        checkInput({ stopDistancePct: 0.5 }),
        ASIA_SESSION,
      );

      expect(sizing.finalRiskPct.toNumber()).toBe(0.7);
      expect(sizing.maxLossUsd.toNumber()).toBe(7);
      expect(sizing.positionSizeUsd.toNumber()).toBe(1400);
      expect(sizing.reasons).toEqual([
        'ASIA session: risk scaled by 0.7 to 0.70%.',
      ]);
    });

    it('should size against the minimum stop distance when the stop is tighter', () => {
      const sizing = policy.size(
        checkInput({ stopDistancePct: 0.01 }),
        US_SESSION,
      );

      expect(sizing.positionSizeUsd.toNumber()).toBe(20000);
    });
  });

  describe('validateCheckInput', () => {
    it('should accept a well-formed request', () => {
      expect(() => policy.validateCheckInput(checkInput())).not.toThrow();
    });

    it.each([0, -100, Number.NaN, Number.POSITIVE_INFINITY])(
      'should reject account_equity %s',
      (accountEquity) => {
        const error = captureViolations(() =>
          policy.validateCheckInput(checkInput({ accountEquity })),
        );
        expect(error.violations).toEqual([
          'account_equity must be greater than 0',
        ]);
        expect(error.code).toBe(JOURNAL_ERROR_CODES.VALIDATION_FAILED);
      },
    );

    it.each([0, -1, 100.5])(
      'should reject intended_risk_pct %s',
      (intendedRiskPct) => {
        const error = captureViolations(() =>
          policy.validateCheckInput(checkInput({ intendedRiskPct })),
        );
        expect(error.violations).toEqual([
          'intended_risk_pct must be in (0, 100]',
        ]);
      },
    );

    it.each([0, -0.5, 25])(
      'should reject stop_distance_pct %s',
      (stopDistancePct) => {
        const error = captureViolations(() =>
          policy.validateCheckInput(checkInput({ stopDistancePct })),
        );
        expect(error.violations).toEqual([
          'stop_distance_pct must be in (0, 20]',
        ]);
      },
    );

    it('should report every violation at once', () => {
      const error = captureViolations(() =>
        policy.validateCheckInput(
          checkInput({ symbol: '  ', accountEquity: -1, timeframe: '' }),
        ),
      );

      expect(error.violations).toEqual([
        'symbol must not be empty',
        'timeframe must not be empty',
        'account_equity must be greater than 0',
      ]);
      expect(error.message).toBe(
        'symbol must not be empty; timeframe must not be empty; account_equity must be greater than 0',
      );
    });
  });

  describe('validateOpenInput', () => {
    it('should accept a PAPER trade', () => {
      expect(() => policy.validateOpenInput(openInput())).not.toThrow();
    });

    it('should reject non-positive entry_price and qty', () => {
      const error = captureViolations(() =>
        policy.validateOpenInput(openInput({ entryPrice: 0, qty: -1 })),
      );

      expect(error.violations).toEqual([
        'entry_price must be greater than 0',
        'qty must be greater than 0',
      ]);
    });

    it('should reject risk_pct above the configured maximum', () => {
      const error = captureViolations(() =>
        policy.validateOpenInput(openInput({ riskPct: 3 })),
      );

      expect(error.violations).toEqual(['risk_pct must be in (0, 2]']);
    });

    it('should reject LIVE mode while live trading is disabled', () => {
      const error = captureViolations(() =>
        policy.validateOpenInput(openInput({ mode: 'LIVE' })),
      );

      expect(error.code).toBe(JOURNAL_ERROR_CODES.LIVE_MODE_DISABLED);
      expect(error.httpStatus).toBe(400);
    });

    it('should accept LIVE mode once enabled', () => {
      const livePolicy = new RiskPolicyService(
        createJournalConfig({ allowLive: true }),
      );

      expect(() =>
        livePolicy.validateOpenInput(openInput({ mode: 'LIVE' })),
      ).not.toThrow();
    });
  });

  describe('validateCloseInput', () => {
    it('should accept a losing close with a negative rr', () => {
      expect(() =>
        policy.validateCloseInput(closeInput({ pnl: -25, rr: -1 })),
      ).not.toThrow();
    });

    it('should reject a non-positive exit_price', () => {
      const error = captureViolations(() =>
        policy.validateCloseInput(closeInput({ exitPrice: 0 })),
      );

      expect(error.violations).toEqual(['exit_price must be greater than 0']);
    });

    it('should reject non-finite pnl and rr', () => {
      const error = captureViolations(() =>
        policy.validateCloseInput(
          closeInput({ pnl: Number.NaN, rr: Number.NEGATIVE_INFINITY }),
        ),
      );

      expect(error.violations).toEqual([
        'pnl must be a finite number',
        'rr must be a finite number',
      ]);
    });

    it('should reject an empty trade_id', () => {
      const error = captureViolations(() =>
        policy.validateCloseInput(closeInput({ tradeId: '' })),
      );

      expect(error.violations).toEqual(['trade_id must not be empty']);
    });
  });
});
