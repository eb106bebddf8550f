import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

@Entity('assets')
export class Asset {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  symbol!: string; // market-data ticker, e.g. AAPL or BTC-USD

  @Column({ default: '' })
  displayName!: string;

  @Column({ default: true })
  enabled!: boolean;
}
