import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JOURNAL_ENTITIES } from '../persistence/entities';
import { TradeRepository } from '../persistence/repositories/trade.repository';
import { DailyStatRepository } from '../persistence/repositories/daily-stat.repository';

/**
 * Global persistence module providing journal repositories.
 * The SQLite schema is synchronized from the entities on startup.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'better-sqlite3' as const,
        database: configService.get<string>(
          'DATABASE_PATH',
          'trading-journal.db',
        ),
        entities: JOURNAL_ENTITIES,
        synchronize: true,
      }),
    }),
    TypeOrmModule.forFeature(JOURNAL_ENTITIES),
  ],
  providers: [TradeRepository, DailyStatRepository],
  exports: [TradeRepository, DailyStatRepository],
})
export class PersistenceModule {}
