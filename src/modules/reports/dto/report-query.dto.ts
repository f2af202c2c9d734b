import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class ReportQueryDto {
  @ApiProperty({ example: 'user-1' })
  @IsString()
  @IsNotEmpty()
  user_id!: string;
}
