import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { SessionService } from './session.service';
import { SessionResponseDto, toSessionDto } from './dto/session-response.dto';

@ApiTags('Session')
@Controller('session')
export class SessionController {
  constructor(private readonly sessionService: SessionService) {}

  @Get()
  @ApiOperation({ summary: 'Current UTC trading session and risk multiplier' })
  getSession(): SessionResponseDto {
    return {
      data: toSessionDto(this.sessionService.detect(new Date())),
      timestamp: new Date().toISOString(),
    };
  }
}
