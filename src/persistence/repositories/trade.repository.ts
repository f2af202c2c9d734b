import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { TradeEntity } from '../entities/trade.entity';
import {
  TRADE_STATUS,
  type TradeCloseFields,
  type TradeMode,
} from '../../common/types/trade.type';
import { toSqliteDatetime } from '../../common/utils/utc-date';

export type NewTrade = Omit<TradeEntity, 'id'>;

@Injectable()
export class TradeRepository {
  constructor(
    @InjectRepository(TradeEntity)
    private readonly trades: Repository<TradeEntity>,
  ) {}

  async create(data: NewTrade): Promise<TradeEntity> {
    return this.trades.save(this.trades.create(data));
  }

  /** Fetches a trade only when it belongs to `userId`. */
  async findOwned(id: string, userId: string): Promise<TradeEntity | null> {
    return this.trades.findOne({ where: { id, userId } });
  }

  async findOpenBySymbol(
    userId: string,
    symbol: string,
    mode: TradeMode,
  ): Promise<TradeEntity | null> {
    return this.trades.findOne({
      where: { userId, symbol, mode, status: TRADE_STATUS.OPEN },
    });
  }

  /**
   * Writes the close fields only while the row is still OPEN.
   * Returns false when another close already won the transition.
   * Pass the transaction's manager to commit the close with other writes.
   */
  async closeIfOpen(
    id: string,
    userId: string,
    fields: TradeCloseFields,
    manager?: EntityManager,
  ): Promise<boolean> {
    const trades = manager ? manager.getRepository(TradeEntity) : this.trades;
    const result = await trades.update(
      { id, userId, status: TRADE_STATUS.OPEN },
      { ...fields, status: TRADE_STATUS.CLOSED },
    );
    return result.affected === 1;
  }

  /** Trades opened at or after `since`, newest first. */
  async findOpenedSince(userId: string, since: Date): Promise<TradeEntity[]> {
    return this.trades
      .createQueryBuilder('trade')
      .where('trade.userId = :userId', { userId })
      .andWhere('trade.openedAt >= :since', {
        since: toSqliteDatetime(since),
      })
      .orderBy('trade.openedAt', 'DESC')
      .getMany();
  }
}
