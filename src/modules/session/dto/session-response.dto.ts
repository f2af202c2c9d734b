import { ApiProperty } from '@nestjs/swagger';
import type { TradingSession } from '../../../common/types/risk.type';

export class TradingSessionDto {
  @ApiProperty({ enum: ['ASIA', 'EU', 'US', 'OFF_HOURS', 'WEEKEND'] })
  name!: string;

  @ApiProperty({ enum: ['very low', 'low', 'medium', 'high'] })
  liquidity!: string;

  @ApiProperty({
    description: 'Factor applied to the capped risk percentage',
    example: 0.9,
  })
  risk_multiplier!: number;

  @ApiProperty({ example: 'Trend formation and structure building.' })
  note!: string;
}

export class SessionResponseDto {
  @ApiProperty({ type: TradingSessionDto })
  data!: TradingSessionDto;

  @ApiProperty({ description: 'Response timestamp (ISO 8601)' })
  timestamp!: string;
}

export function toSessionDto(session: TradingSession): TradingSessionDto {
  return {
    name: session.name,
    liquidity: session.liquidity,
    risk_multiplier: session.riskMultiplier,
    note: session.note,
  };
}
