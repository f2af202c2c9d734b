import { BaseEvent } from './base.event';
import type { TradeMode } from '../types/trade.type';

export class TradeOpenedEvent extends BaseEvent {
  constructor(
    public readonly tradeId: string,
    public readonly userId: string,
    public readonly symbol: string,
    public readonly strategy: string,
    public readonly mode: TradeMode,
    public readonly entryPrice: number,
    public readonly qty: number,
    public readonly riskPct: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class TradeClosedEvent extends BaseEvent {
  constructor(
    public readonly tradeId: string,
    public readonly userId: string,
    public readonly symbol: string,
    public readonly exitPrice: number,
    public readonly pnl: number,
    public readonly rr: number | null,
    public readonly ruleViolation: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class TradeCheckBlockedEvent extends BaseEvent {
  constructor(
    public readonly userId: string,
    public readonly symbol: string,
    public readonly strategy: string,
    public readonly reasons: string[],
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
