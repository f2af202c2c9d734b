import { Body, Controller, HttpCode, Inject, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { ITradeRiskEngine } from '../../common/interfaces/trade-risk-engine.interface';
import { JournalValidationPipe } from '../../common/pipes/journal-validation.pipe';
import { CheckTradeDto } from './dto/check-trade.dto';
import {
  CheckTradeResponseDto,
  toCheckTradeResultDto,
} from './dto/check-trade-response.dto';
import { TRADE_RISK_ENGINE_TOKEN } from './trade-journal.constants';

@ApiTags('Risk Check')
@Controller('nexus')
export class RiskCheckController {
  constructor(
    @Inject(TRADE_RISK_ENGINE_TOKEN)
    private readonly engine: ITradeRiskEngine,
  ) {}

  @Post('check-trade')
  @HttpCode(200)
  @ApiOperation({ summary: 'Size a proposed trade and decide ALLOW / WARN / BLOCK' })
  @ApiResponse({ status: 200, type: CheckTradeResponseDto })
  @ApiResponse({ status: 400, description: 'Malformed or out-of-bounds input' })
  async checkTrade(
    @Body(new JournalValidationPipe()) dto: CheckTradeDto,
  ): Promise<CheckTradeResponseDto> {
    const result = await this.engine.checkTrade({
      userId: dto.user_id,
      symbol: dto.symbol,
      strategy: dto.strategy,
      accountEquity: dto.account_equity,
      intendedRiskPct: dto.intended_risk_pct,
      stopDistancePct: dto.stop_distance_pct,
      timeframe: dto.timeframe,
    });

    return {
      data: toCheckTradeResultDto(result),
      timestamp: new Date().toISOString(),
    };
  }
}
