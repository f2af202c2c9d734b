import { Module } from '@nestjs/common';
import { BehaviorModule } from '../behavior/behavior.module';
import { RiskManagementModule } from '../risk-management/risk-management.module';
import { SessionModule } from '../session/session.module';
import { RiskCheckController } from './risk-check.controller';
import { TradesController } from './trades.controller';
import { TradeLockService } from './trade-lock.service';
import { TradeRiskEngineService } from './trade-risk-engine.service';
import { TRADE_RISK_ENGINE_TOKEN } from './trade-journal.constants';

export { TRADE_RISK_ENGINE_TOKEN };

@Module({
  imports: [RiskManagementModule, BehaviorModule, SessionModule],
  controllers: [RiskCheckController, TradesController],
  providers: [
    TradeLockService,
    {
      provide: TRADE_RISK_ENGINE_TOKEN,
      useClass: TradeRiskEngineService,
    },
  ],
  exports: [TRADE_RISK_ENGINE_TOKEN],
})
export class TradeJournalModule {}
