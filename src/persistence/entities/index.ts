import { DailyStatEntity } from './daily-stat.entity';
import { TradeEntity } from './trade.entity';

export { DailyStatEntity, TradeEntity };

export const JOURNAL_ENTITIES = [TradeEntity, DailyStatEntity];
