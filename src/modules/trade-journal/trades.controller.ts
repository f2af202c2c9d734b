import {
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { ITradeRiskEngine } from '../../common/interfaces/trade-risk-engine.interface';
import { JournalValidationPipe } from '../../common/pipes/journal-validation.pipe';
import { OpenTradeDto } from './dto/open-trade.dto';
import { CloseTradeDto } from './dto/close-trade.dto';
import { ListTradesQueryDto } from './dto/list-trades-query.dto';
import {
  TradeListResponseDto,
  TradeResponseDto,
  toTradeDto,
} from './dto/trade-response.dto';
import { TRADE_RISK_ENGINE_TOKEN } from './trade-journal.constants';

@ApiTags('Trades')
@Controller('trades')
export class TradesController {
  constructor(
    @Inject(TRADE_RISK_ENGINE_TOKEN)
    private readonly engine: ITradeRiskEngine,
  ) {}

  @Post('open')
  @HttpCode(201)
  @ApiOperation({ summary: 'Journal a new OPEN trade' })
  @ApiResponse({ status: 201, type: TradeResponseDto })
  @ApiResponse({ status: 400, description: 'Malformed or out-of-bounds input' })
  @ApiResponse({
    status: 409,
    description: 'An OPEN trade on the same symbol and mode already exists',
  })
  async openTrade(
    @Body(new JournalValidationPipe()) dto: OpenTradeDto,
  ): Promise<TradeResponseDto> {
    const trade = await this.engine.openTrade({
      userId: dto.user_id,
      symbol: dto.symbol,
      strategy: dto.strategy,
      entryPrice: dto.entry_price,
      qty: dto.qty,
      riskPct: dto.risk_pct,
      stopDistancePct: dto.stop_distance_pct,
      mode: dto.mode,
      notes: dto.notes,
    });

    return { data: toTradeDto(trade), timestamp: new Date().toISOString() };
  }

  @Post('close')
  @HttpCode(200)
  @ApiOperation({ summary: 'Close an OPEN trade and record its result' })
  @ApiResponse({ status: 200, type: TradeResponseDto })
  @ApiResponse({
    status: 404,
    description: 'No OPEN trade with this id belongs to the user',
  })
  async closeTrade(
    @Body(new JournalValidationPipe()) dto: CloseTradeDto,
  ): Promise<TradeResponseDto> {
    const trade = await this.engine.closeTrade({
      userId: dto.user_id,
      tradeId: dto.trade_id,
      exitPrice: dto.exit_price,
      pnl: dto.pnl,
      rr: dto.rr,
      ruleViolation: dto.rule_violation,
      notes: dto.notes,
    });

    return { data: toTradeDto(trade), timestamp: new Date().toISOString() };
  }

  @Get()
  @ApiOperation({ summary: 'Trades opened in the last N days, newest first' })
  @ApiResponse({ status: 200, type: TradeListResponseDto })
  async listTrades(
    @Query(new JournalValidationPipe()) query: ListTradesQueryDto,
  ): Promise<TradeListResponseDto> {
    const trades = await this.engine.listTrades(query.user_id, query.days);

    return {
      data: trades.map(toTradeDto),
      count: trades.length,
      timestamp: new Date().toISOString(),
    };
  }
}
