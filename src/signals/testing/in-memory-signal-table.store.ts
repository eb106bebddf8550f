import { SignalTableStore } from '../signal-table.store';
import { SignalRecord } from '../signal-record';

/** Store double for specs; copies on the way in and out like a real round trip. */
export class InMemorySignalTableStore extends SignalTableStore {
  readonly tables = new Map<string, SignalRecord[]>();
  writes = 0;
  failReads = false;
  failWrites = false;

  async readTable(timeframe: string): Promise<SignalRecord[]> {
    if (this.failReads) {
      throw new Error(`read failed for ${timeframe}`);
    }
    return (this.tables.get(timeframe) ?? []).map((record) => ({ ...record, trends: { ...record.trends } }));
  }

  async writeTables(tables: ReadonlyMap<string, readonly SignalRecord[]>): Promise<void> {
    if (this.failWrites) {
      throw new Error('write failed');
    }
    for (const [timeframe, records] of tables) {
      this.tables.set(
        timeframe,
        records.map((record) => ({ ...record, trends: { ...record.trends } })),
      );
    }
    this.writes++;
  }
}
