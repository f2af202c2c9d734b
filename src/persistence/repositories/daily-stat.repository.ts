import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, EntityManager, Repository } from 'typeorm';
import { DailyStatEntity } from '../entities/daily-stat.entity';
import { toSqliteDatetime } from '../../common/utils/utc-date';

/**
 * Write paths accept an optional EntityManager so a trade close and its
 * stats update can commit together.
 */
@Injectable()
export class DailyStatRepository {
  constructor(
    @InjectRepository(DailyStatEntity)
    private readonly stats: Repository<DailyStatEntity>,
  ) {}

  async findByUserAndDay(
    userId: string,
    day: string,
    manager?: EntityManager,
  ): Promise<DailyStatEntity | null> {
    return this.repository(manager).findOne({ where: { userId, day } });
  }

  /** The row holding the latest cooldown still running at `now`, on any day. */
  async findActiveCooldown(
    userId: string,
    now: Date,
  ): Promise<DailyStatEntity | null> {
    return this.stats
      .createQueryBuilder('stat')
      .where('stat.userId = :userId', { userId })
      .andWhere('stat.cooldownUntil > :now', { now: toSqliteDatetime(now) })
      .orderBy('stat.cooldownUntil', 'DESC')
      .getOne();
  }

  /** Rows with `startDay <= day <= endDay`, oldest first. */
  async findByDayRange(
    userId: string,
    startDay: string,
    endDay: string,
  ): Promise<DailyStatEntity[]> {
    return this.stats.find({
      where: { userId, day: Between(startDay, endDay) },
      order: { day: 'ASC' },
    });
  }

  /** Existing row for the day, or an unsaved zeroed one. */
  async getOrInit(
    userId: string,
    day: string,
    manager?: EntityManager,
  ): Promise<DailyStatEntity> {
    const existing = await this.findByUserAndDay(userId, day, manager);
    if (existing) return existing;
    return this.repository(manager).create({
      userId,
      day,
      tradesCount: 0,
      wins: 0,
      losses: 0,
      realizedPnl: 0,
      consecutiveLosses: 0,
      cooldownUntil: null,
    });
  }

  async save(
    stat: DailyStatEntity,
    manager?: EntityManager,
  ): Promise<DailyStatEntity> {
    return this.repository(manager).save(stat);
  }

  private repository(manager?: EntityManager): Repository<DailyStatEntity> {
    return manager ? manager.getRepository(DailyStatEntity) : this.stats;
  }
}
