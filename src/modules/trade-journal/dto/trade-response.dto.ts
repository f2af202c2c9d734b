import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TRADE_MODES, type Trade } from '../../../common/types/trade.type';

export class TradeDto {
  @ApiProperty({ format: 'uuid' })
  id!: string;

  @ApiProperty()
  user_id!: string;

  @ApiProperty({ example: 'BTCUSDT' })
  symbol!: string;

  @ApiProperty()
  strategy!: string;

  @ApiProperty({ enum: [...TRADE_MODES] })
  mode!: string;

  @ApiProperty({ enum: ['OPEN', 'CLOSED'] })
  status!: string;

  @ApiProperty({ description: 'ISO 8601' })
  opened_at!: string;

  @ApiProperty({ type: String, nullable: true })
  closed_at!: string | null;

  @ApiProperty()
  entry_price!: number;

  @ApiProperty({ type: Number, nullable: true })
  exit_price!: number | null;

  @ApiProperty()
  qty!: number;

  @ApiProperty()
  risk_pct!: number;

  @ApiProperty()
  stop_distance_pct!: number;

  @ApiProperty({ type: Number, nullable: true })
  pnl!: number | null;

  @ApiProperty({ type: Number, nullable: true })
  rr!: number | null;

  @ApiProperty()
  rule_violation!: boolean;

  @ApiPropertyOptional({ type: String, nullable: true })
  notes!: string | null;
}

export class TradeResponseDto {
  @ApiProperty({ type: TradeDto })
  data!: TradeDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export class TradeListResponseDto {
  @ApiProperty({ type: [TradeDto] })
  data!: TradeDto[];

  @ApiProperty()
  count!: number;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export function toTradeDto(trade: Trade): TradeDto {
  return {
    id: trade.id,
    user_id: trade.userId,
    symbol: trade.symbol,
    strategy: trade.strategy,
    mode: trade.mode,
    status: trade.status,
    opened_at: trade.openedAt.toISOString(),
    closed_at: trade.closedAt ? trade.closedAt.toISOString() : null,
    entry_price: trade.entryPrice,
    exit_price: trade.exitPrice,
    qty: trade.qty,
    risk_pct: trade.riskPct,
    stop_distance_pct: trade.stopDistancePct,
    pnl: trade.pnl,
    rr: trade.rr,
    rule_violation: trade.ruleViolation,
    notes: trade.notes,
  };
}
