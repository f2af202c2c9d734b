import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class ListTradesQueryDto {
  @ApiProperty({ example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  @ApiPropertyOptional({ minimum: 1, maximum: 365, default: 7 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(365)
  @IsOptional()
  days = 7;
}
