import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { PersistenceModule } from './common/persistence.module';
import { JournalConfigModule } from './common/config/journal-config.module';
import { loggerConfig } from './common/config/logger.config';
import { SystemErrorFilter } from './common/filters/system-error.filter';
import { TradeJournalModule } from './modules/trade-journal/trade-journal.module';
import { ReportsModule } from './modules/reports/reports.module';
import { SessionModule } from './modules/session/session.module';
import { MonitoringModule } from './modules/monitoring/monitoring.module';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 10,
      verboseMemoryLeak: true,
    }),
    JournalConfigModule,
    PersistenceModule,
    TradeJournalModule,
    ReportsModule,
    SessionModule,
    MonitoringModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_FILTER, useClass: SystemErrorFilter }],
})
export class AppModule {}
