import Decimal from 'decimal.js';

// Isolated Decimal constructor configured for financial precision.
// Uses Decimal.clone() to avoid mutating the global Decimal settings,
// so other modules can safely import decimal.js with their own config.
export const FinancialDecimal = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 20,
});

/**
 * Pure money math for pre-trade risk sizing.
 * All methods use decimal.js, never native `number` for financial calculations.
 * Percentages are expressed in percent units (1.0 = 1%).
 */
export class FinancialMath {
  /**
   * Money put at risk by a trade.
   * Formula: accountEquity × riskPct / 100
   */
  static riskAmount(accountEquity: Decimal, riskPct: Decimal): Decimal {
    FinancialMath.validateDecimalInput(accountEquity, 'accountEquity');
    FinancialMath.validateDecimalInput(riskPct, 'riskPct');

    return accountEquity.mul(riskPct).div(100);
  }

  /**
   * Notional that loses exactly `maxLoss` when the stop is hit.
   * Formula: maxLoss / (stopDistancePct / 100)
   */
  static positionSize(maxLoss: Decimal, stopDistancePct: Decimal): Decimal {
    FinancialMath.validateDecimalInput(maxLoss, 'maxLoss');
    FinancialMath.validateDecimalInput(stopDistancePct, 'stopDistancePct');

    if (stopDistancePct.isZero()) {
      throw new Error(
        'FinancialMath: stopDistancePct must not be zero (division by zero)',
      );
    }

    return maxLoss.div(stopDistancePct.div(100));
  }

  /** Sum of signed P&L values. */
  static sum(values: number[]): Decimal {
    return values.reduce<Decimal>(
      (total, value) => total.plus(new FinancialDecimal(value)),
      new FinancialDecimal(0),
    );
  }

  private static validateDecimalInput(value: Decimal, name: string): void {
    if (value.isNaN()) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!value.isFinite()) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }
}
