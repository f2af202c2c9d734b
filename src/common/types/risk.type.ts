import type Decimal from 'decimal.js';

export const CHECK_DECISIONS = ['ALLOW', 'WARN', 'BLOCK'] as const;
export type CheckDecision = (typeof CHECK_DECISIONS)[number];

export interface CheckTradeInput {
  userId: string;
  symbol: string;
  strategy: string;
  accountEquity: number;
  intendedRiskPct: number;
  stopDistancePct: number;
  timeframe: string;
}

export interface RiskSizing {
  /** equity × intended risk %, before any cap */
  riskAmountUsd: Decimal;
  cappedRiskPct: Decimal;
  /** capped risk % after the session multiplier */
  finalRiskPct: Decimal;
  maxLossUsd: Decimal;
  positionSizeUsd: Decimal;
  capped: boolean;
  reasons: string[];
}

export interface TradingSession {
  name: 'ASIA' | 'EU' | 'US' | 'OFF_HOURS' | 'WEEKEND';
  liquidity: 'very low' | 'low' | 'medium' | 'high';
  riskMultiplier: number;
  note: string;
}

export interface BehaviorCheck {
  allowed: boolean;
  reasons: string[];
  suggestedActions: string[];
  cooldownUntil: Date | null;
}

export interface CheckTradeResult {
  allowed: boolean;
  decision: CheckDecision;
  reason?: string;
  reasons: string[];
  suggestedActions: string[];
  riskAmountUsd: number;
  riskPct: number;
  maxLossUsd: number;
  positionSizeUsd: number;
  session: TradingSession;
}

export interface JournalLimits {
  maxRiskPct: number;
  minStopDistancePct: number;
  maxStopDistancePct: number;
  maxTradesPerDay: number;
  cooldownMinutes: number;
  cooldownLossStreak: number;
  allowLive: boolean;
}
