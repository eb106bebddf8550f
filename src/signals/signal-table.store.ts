import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Signal } from '../entities/signal.entity';
import { LoggerService } from '../logger/logger.service';
import { StoreReadError, StoreWriteError } from '../common/errors';
import { SignalRecord } from './signal-record';

/**
 * Persisted signal tables, one per timeframe.
 */
export abstract class SignalTableStore {
  /** Rows in persisted order; empty when the timeframe has never been written. */
  abstract readTable(timeframe: string): Promise<SignalRecord[]>;

  /**
   * Replaces every given timeframe's table in one atomic step. Timeframes not in
   * `tables` and every other table in the store are left as they are.
   */
  abstract writeTables(tables: ReadonlyMap<string, readonly SignalRecord[]>): Promise<void>;
}

const INSERT_CHUNK_SIZE = 500;

export const toSignalRecord = (row: Signal): SignalRecord => ({
  datetime: row.datetime,
  signal: row.signal,
  token: row.token,
  notes: row.notes ?? '',
  closePrice: row.closePrice,
  cci: row.cci,
  stochK: row.stochK,
  stochD: row.stochD,
  slopeK: row.slopeK,
  slopeD: row.slopeD,
  plusDi: row.plusDi,
  minusDi: row.minusDi,
  adx: row.adx,
  trends: row.trends ?? {},
  tradeType: row.tradeType ?? '',
  entryPrice: row.entryPrice,
  targetExitPrice: row.targetExitPrice,
  exitPrice: row.exitPrice,
  pnl: row.pnl,
  pnlPct: row.pnlPct,
});

const toSignalRow = (timeframe: string, rowIndex: number, record: SignalRecord) => ({
  timeframe,
  rowIndex,
  ...record,
});

@Injectable()
export class TypeOrmSignalTableStore extends SignalTableStore {
  constructor(
    @InjectRepository(Signal)
    private signalRepository: Repository<Signal>,
    private logger: LoggerService,
  ) {
    super();
    this.logger.setContext('SignalTableStore');
  }

  async readTable(timeframe: string): Promise<SignalRecord[]> {
    try {
      const rows = await this.signalRepository.find({
        where: { timeframe },
        order: { rowIndex: 'ASC' },
      });
      return rows.map(toSignalRecord);
    } catch (error: unknown) {
      throw new StoreReadError(timeframe, error);
    }
  }

  async writeTables(tables: ReadonlyMap<string, readonly SignalRecord[]>): Promise<void> {
    const timeframes = [...tables.keys()];

    try {
      await this.signalRepository.manager.transaction(async (manager) => {
        for (const [timeframe, records] of tables) {
          await manager.delete(Signal, { timeframe });

          const rows = records.map((record, index) => toSignalRow(timeframe, index, record));
          for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
            await manager.insert(Signal, rows.slice(i, i + INSERT_CHUNK_SIZE));
          }
        }
      });
    } catch (error: unknown) {
      throw new StoreWriteError(timeframes, error);
    }

    this.logger.debug('Persisted signal tables', {
      tables: Object.fromEntries(timeframes.map((tf) => [tf, tables.get(tf)?.length ?? 0])),
    });
  }
}
