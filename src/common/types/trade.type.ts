export const TRADE_MODES = ['PAPER', 'LIVE'] as const;
export type TradeMode = (typeof TRADE_MODES)[number];

export const TRADE_STATUS = {
  OPEN: 'OPEN',
  CLOSED: 'CLOSED',
} as const;
export type TradeStatus = (typeof TRADE_STATUS)[keyof typeof TRADE_STATUS];

/**
 * A journal entry. Close fields stay null while the trade is OPEN and are
 * written exactly once by the OPEN → CLOSED transition.
 */
export interface Trade {
  id: string;
  userId: string;
  symbol: string;
  strategy: string;
  mode: TradeMode;
  status: TradeStatus;
  openedAt: Date;
  closedAt: Date | null;
  entryPrice: number;
  exitPrice: number | null;
  qty: number;
  riskPct: number;
  stopDistancePct: number;
  pnl: number | null;
  rr: number | null;
  ruleViolation: boolean;
  notes: string | null;
}

export interface OpenTradeInput {
  userId: string;
  symbol: string;
  strategy: string;
  entryPrice: number;
  qty: number;
  riskPct: number;
  stopDistancePct: number;
  mode: TradeMode;
  notes?: string | null;
}

export interface CloseTradeInput {
  userId: string;
  tradeId: string;
  exitPrice: number;
  pnl: number;
  rr?: number | null;
  ruleViolation?: boolean;
  notes?: string | null;
}

/** Fields written by the OPEN → CLOSED transition. */
export interface TradeCloseFields {
  closedAt: Date;
  exitPrice: number;
  pnl: number;
  rr: number | null;
  ruleViolation: boolean;
  notes: string | null;
}
