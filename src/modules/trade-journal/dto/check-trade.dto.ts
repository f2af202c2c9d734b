import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';

export class CheckTradeDto {
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

  @ApiProperty({ description: 'Account equity in USD', example: 1000 })
  @IsNumber()
  account_equity!: number;

  @ApiProperty({
    description: 'Intended risk as a percentage of equity',
    example: 1.0,
  })
  @IsNumber()
  intended_risk_pct!: number;

  @ApiProperty({
    description: 'Distance from entry to stop, in percent of price',
    example: 1.5,
  })
  @IsNumber()
  stop_distance_pct!: number;

  @ApiProperty({ required: false, default: '1m', example: '15m' })
  @IsString()
  @IsOptional()
  timeframe = '1m';
}
