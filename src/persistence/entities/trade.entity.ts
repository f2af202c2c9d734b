import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import type {
  Trade,
  TradeMode,
  TradeStatus,
} from '../../common/types/trade.type';

@Entity('trades')
@Index('ix_trades_user_opened', ['userId', 'openedAt'])
export class TradeEntity implements Trade {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'varchar', length: 64 })
  userId!: string;

  @Index()
  @Column({ type: 'varchar', length: 32 })
  symbol!: string;

  @Column({ type: 'varchar', length: 64 })
  strategy!: string;

  @Column({ type: 'varchar', length: 16 })
  mode!: TradeMode;

  @Column({ type: 'varchar', length: 16 })
  status!: TradeStatus;

  @Column({ name: 'opened_at', type: 'datetime' })
  openedAt!: Date;

  @Column({ name: 'closed_at', type: 'datetime', nullable: true })
  closedAt!: Date | null;

  @Column({ name: 'entry_price', type: 'real' })
  entryPrice!: number;

  @Column({ name: 'exit_price', type: 'real', nullable: true })
  exitPrice!: number | null;

  @Column({ type: 'real' })
  qty!: number;

  @Column({ name: 'risk_pct', type: 'real' })
  riskPct!: number;

  @Column({ name: 'stop_distance_pct', type: 'real' })
  stopDistancePct!: number;

  /** Realized P&L in quote currency */
  @Column({ type: 'real', nullable: true })
  pnl!: number | null;

  /** Risk/reward multiple */
  @Column({ type: 'real', nullable: true })
  rr!: number | null;

  @Column({ name: 'rule_violation', type: 'boolean', default: false })
  ruleViolation!: boolean;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;
}
