import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class CloseTradeDto {
  @ApiProperty({ example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  @ApiProperty({ format: 'uuid' })
  @IsString()
  @IsNotEmpty()
  trade_id!: string;

  @ApiProperty({ example: 50750 })
  @IsNumber()
  exit_price!: number;

  @ApiProperty({ description: 'Realized P&L in USD, signed', example: 7.5 })
  @IsNumber()
  pnl!: number;

  @ApiPropertyOptional({
    description: 'Reward-to-risk multiple, signed',
    example: 1.5,
    nullable: true,
  })
  @IsNumber()
  @IsOptional()
  rr?: number | null;

  @ApiPropertyOptional({ default: false })
  @IsBoolean()
  @IsOptional()
  rule_violation = false;

  @ApiPropertyOptional({ maxLength: 2000 })
  @IsString()
  @MaxLength(2000)
  @IsOptional()
  notes?: string;
}
