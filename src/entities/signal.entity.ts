import { Entity, PrimaryGeneratedColumn, Column, Index, UpdateDateColumn } from 'typeorm';
import { SignalState, TradeType, TrendDirection } from '../signals/signal-record';

@Entity('signals')
@Index(['timeframe', 'datetime', 'token', 'signal'], { unique: true })
@Index(['timeframe', 'rowIndex'])
export class Signal {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  timeframe!: string; // weekly, daily, 4h

  @Column('int')
  rowIndex!: number; // position within the timeframe's table

  @Column('varchar', { length: 19 })
  datetime!: string; // naive YYYY-MM-DDTHH:mm:ss

  @Column('varchar', { length: 8 })
  signal!: SignalState;

  @Column()
  token!: string;

  @Column('text', { default: '' })
  notes!: string;

  @Column('double precision', { nullable: true })
  closePrice!: number | null;

  @Column('double precision', { nullable: true })
  cci!: number | null;

  @Column('double precision', { nullable: true })
  stochK!: number | null;

  @Column('double precision', { nullable: true })
  stochD!: number | null;

  @Column('double precision', { nullable: true })
  slopeK!: number | null;

  @Column('double precision', { nullable: true })
  slopeD!: number | null;

  @Column('double precision', { nullable: true })
  plusDi!: number | null;

  @Column('double precision', { nullable: true })
  minusDi!: number | null;

  @Column('double precision', { nullable: true })
  adx!: number | null;

  @Column('jsonb', { default: () => "'{}'" })
  trends!: Record<string, TrendDirection>; // sibling timeframe -> up/down/''

  @Column('varchar', { length: 4, default: '' })
  tradeType!: TradeType;

  @Column('double precision', { nullable: true })
  entryPrice!: number | null;

  @Column('double precision', { nullable: true })
  targetExitPrice!: number | null;

  @Column('double precision', { nullable: true })
  exitPrice!: number | null;

  @Column('double precision', { nullable: true })
  pnl!: number | null;

  @Column('double precision', { nullable: true })
  pnlPct!: number | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
