import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { TRADE_MODES, type TradeMode } from '../../../common/types/trade.type';

export class OpenTradeDto {
  @ApiProperty({ example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  @ApiProperty({ example: 'BTCUSDT' })
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @ApiProperty({ example: 'breakout' })
  @IsString()
  @IsNotEmpty()
  strategy!: string;

  @ApiProperty({ example: 50000 })
  @IsNumber()
  entry_price!: number;

  @ApiProperty({ example: 0.01 })
  @IsNumber()
  qty!: number;

  @ApiProperty({ description: 'Risk taken, percent of equity', example: 1 })
  @IsNumber()
  risk_pct!: number;

  @ApiProperty({ example: 1.5 })
  @IsNumber()
  stop_distance_pct!: number;

  @ApiPropertyOptional({ enum: [...TRADE_MODES], default: 'PAPER' })
  @IsIn([...TRADE_MODES])
  @IsOptional()
  mode: TradeMode = 'PAPER';

  @ApiPropertyOptional({ maxLength: 2000 })
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  notes?: string;
}
