import { buildTableSchema, normalizeRecord } from './signal-table.schema';
import { INDICATOR_FIELDS, SignalRecord, identityKey, pickJournal } from './signal-record';

export interface ReconcileInput {
  timeframe: string;
  /** Every configured timeframe name, this one included. */
  timeframes: readonly string[];
  /** Freshly computed, trend-enriched records. */
  incoming: readonly SignalRecord[];
  /** Previously persisted table; empty when none could be read. */
  previous: readonly SignalRecord[];
}

export const roundTo2 = (value: number | null): number | null => {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  const rounded = Number(value.toFixed(2));
  return rounded === 0 ? 0 : rounded;
};

export const roundIndicators = (record: SignalRecord): SignalRecord => {
  const rounded: SignalRecord = { ...record };
  for (const field of INDICATOR_FIELDS) {
    rounded[field] = roundTo2(record[field]);
  }
  return rounded;
};

/**
 * Merges a timeframe's new records into its persisted table.
 *
 * Computed columns come from the new record; notes and journal fields come from
 * the persisted record with the same (datetime, token, signal). Persisted rows
 * that were not regenerated are kept after the new ones, and the first row per
 * key wins.
 */
export const reconcileTable = ({ timeframe, timeframes, incoming, previous }: ReconcileInput): SignalRecord[] => {
  const schema = buildTableSchema(timeframe, timeframes);
  const fresh = incoming.map((r) => normalizeRecord(r, schema));
  const persisted = previous.map((r) => normalizeRecord(r, schema));

  const persistedByKey = new Map<string, SignalRecord>();
  for (const record of persisted) {
    const key = identityKey(record);
    if (!persistedByKey.has(key)) {
      persistedByKey.set(key, record);
    }
  }

  const merged = fresh.map((record): SignalRecord => {
    const match = persistedByKey.get(identityKey(record));
    if (!match) {
      return record;
    }
    return { ...record, notes: match.notes, ...pickJournal(match) };
  });

  const freshKeys = new Set(fresh.map(identityKey));
  const retained = persisted.filter((record) => !freshKeys.has(identityKey(record)));

  const seen = new Set<string>();
  const table: SignalRecord[] = [];
  for (const record of [...merged, ...retained]) {
    const key = identityKey(record);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    table.push(roundIndicators(record));
  }
  return table;
};
