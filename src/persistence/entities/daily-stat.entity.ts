import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/** Per-user, per-UTC-day discipline counters. */
@Entity('daily_stats')
@Unique('uq_daily_stats_user_day', ['userId', 'day'])
export class DailyStatEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'varchar', length: 64 })
  userId!: string;

  /** UTC calendar day, YYYY-MM-DD */
  @Column({ type: 'varchar', length: 10 })
  day!: string;

  @Column({ name: 'trades_count', type: 'integer', default: 0 })
  tradesCount!: number;

  @Column({ type: 'integer', default: 0 })
  wins!: number;

  @Column({ type: 'integer', default: 0 })
  losses!: number;

  @Column({ name: 'realized_pnl', type: 'real', default: 0 })
  realizedPnl!: number;

  @Column({ name: 'consecutive_losses', type: 'integer', default: 0 })
  consecutiveLosses!: number;

  @Column({ name: 'cooldown_until', type: 'datetime', nullable: true })
  cooldownUntil!: Date | null;
}
