import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  CHECK_DECISIONS,
  type CheckTradeResult,
} from '../../../common/types/risk.type';
import {
  TradingSessionDto,
  toSessionDto,
} from '../../session/dto/session-response.dto';

export class CheckTradeResultDto {
  @ApiProperty({ description: 'False only when the decision is BLOCK' })
  allowed!: boolean;

  @ApiProperty({ enum: [...CHECK_DECISIONS] })
  decision!: string;

  @ApiPropertyOptional({ description: 'First reason, for WARN and BLOCK' })
  reason?: string;

  @ApiProperty({ type: [String] })
  reasons!: string[];

  @ApiProperty({ type: [String] })
  suggested_actions!: string[];

  @ApiProperty({
    description: 'Equity × intended risk / 100, before any cap',
    example: 10,
  })
  risk_amount_usd!: number;

  @ApiProperty({ description: 'Risk percent after cap and session scaling' })
  risk_pct!: number;

  @ApiProperty()
  max_loss_usd!: number;

  @ApiProperty()
  position_size_usd!: number;

  @ApiProperty({ type: TradingSessionDto })
  session!: TradingSessionDto;
}

export class CheckTradeResponseDto {
  @ApiProperty({ type: CheckTradeResultDto })
  data!: CheckTradeResultDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export function toCheckTradeResultDto(
  result: CheckTradeResult,
): CheckTradeResultDto {
  return {
    allowed: result.allowed,
    decision: result.decision,
    ...(result.reason !== undefined ? { reason: result.reason } : {}),
    reasons: result.reasons,
    suggested_actions: result.suggestedActions,
    risk_amount_usd: result.riskAmountUsd,
    risk_pct: result.riskPct,
    max_loss_usd: result.maxLossUsd,
    position_size_usd: result.positionSizeUsd,
    session: toSessionDto(result.session),
  };
}
