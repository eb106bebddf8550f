import { siblingTimeframes } from '../strategy/trend-enricher';
import { SignalRecord, TrendDirection } from './signal-record';

type CellValue = string | number;

type Column = {
  header: string;
  read: (record: SignalRecord) => string | number | null;
};

export interface TableSchema {
  timeframe: string;
  /** Sibling timeframes in column order. */
  siblings: string[];
  columns: string[];
}

export interface TableView {
  timeframe: string;
  columns: string[];
  rows: CellValue[][];
}

export const trendColumn = (timeframe: string): string => `${timeframe}_trend`;

const LEADING_COLUMNS: Column[] = [
  { header: 'datetime', read: (r) => r.datetime },
  { header: 'signal', read: (r) => r.signal },
  { header: 'notes', read: (r) => r.notes },
];

const INDICATOR_COLUMNS: Column[] = [
  { header: 'token', read: (r) => r.token },
  { header: 'close price', read: (r) => r.closePrice },
  { header: 'CCI', read: (r) => r.cci },
  { header: 'stoch K', read: (r) => r.stochK },
  { header: 'stoch D', read: (r) => r.stochD },
  { header: 'slope K', read: (r) => r.slopeK },
  { header: 'slope D', read: (r) => r.slopeD },
  { header: '+DI', read: (r) => r.plusDi },
  { header: '-DI', read: (r) => r.minusDi },
  { header: 'ADX', read: (r) => r.adx },
];

const JOURNAL_COLUMNS: Column[] = [
  { header: 'Trade Type', read: (r) => r.tradeType },
  { header: 'Entry Price', read: (r) => r.entryPrice },
  { header: 'Target Exit Price', read: (r) => r.targetExitPrice },
  { header: 'Exit Price', read: (r) => r.exitPrice },
  { header: 'PNL', read: (r) => r.pnl },
  { header: 'PNL %', read: (r) => r.pnlPct },
];

const layout = (siblings: string[]): Column[] => [
  ...LEADING_COLUMNS,
  ...INDICATOR_COLUMNS,
  ...siblings.map((sibling): Column => ({ header: trendColumn(sibling), read: (r) => r.trends[sibling] ?? '' })),
  ...JOURNAL_COLUMNS,
];

/**
 * Column layout of one timeframe's table, derived from the configured timeframes
 * before any rows are read.
 */
export const buildTableSchema = (timeframe: string, timeframes: readonly string[]): TableSchema => {
  const siblings = siblingTimeframes(timeframe, timeframes);
  return { timeframe, siblings, columns: layout(siblings).map((c) => c.header) };
};

/** Restricts trends to the schema's siblings, filling absent ones with "". */
export const normalizeRecord = (record: SignalRecord, schema: TableSchema): SignalRecord => {
  const trends: Record<string, TrendDirection> = {};
  for (const sibling of schema.siblings) {
    trends[sibling] = record.trends[sibling] ?? '';
  }
  return { ...record, trends };
};

export const toTableView = (records: readonly SignalRecord[], schema: TableSchema): TableView => {
  const columns = layout(schema.siblings);
  return {
    timeframe: schema.timeframe,
    columns: columns.map((c) => c.header),
    rows: records.map((record) => columns.map((c) => c.read(record) ?? '')),
  };
};
