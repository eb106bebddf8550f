import { buildTableSchema, normalizeRecord, toTableView, trendColumn } from './signal-table.schema';
import { EMPTY_JOURNAL, SignalRecord } from './signal-record';

const TIMEFRAMES = ['weekly', 'daily', '4h'];

const record: SignalRecord = {
  datetime: '2024-03-01T00:00:00',
  signal: 'Sell+',
  token: 'MSFT',
  notes: 'trim',
  closePrice: 410.5,
  cci: 130.25,
  stochK: 70,
  stochD: 75.5,
  slopeK: -1.2,
  slopeD: -0.8,
  plusDi: 12,
  minusDi: 28,
  adx: 26.5,
  trends: { weekly: 'down' },
  ...EMPTY_JOURNAL,
};

describe('signal table schema', () => {
  it('orders columns with sorted sibling trends before the journal', () => {
    expect(buildTableSchema('daily', TIMEFRAMES).columns).toEqual([
      'datetime',
      'signal',
      'notes',
      'token',
      'close price',
      'CCI',
      'stoch K',
      'stoch D',
      'slope K',
      'slope D',
      '+DI',
      '-DI',
      'ADX',
      '4h_trend',
      'weekly_trend',
      'Trade Type',
      'Entry Price',
      'Target Exit Price',
      'Exit Price',
      'PNL',
      'PNL %',
    ]);
  });

  it('names trend columns after the timeframe', () => {
    expect(trendColumn('4h')).toBe('4h_trend');
  });

  it('normalizes trends to the schema siblings', () => {
    const schema = buildTableSchema('4h', TIMEFRAMES);
    const normalized = normalizeRecord({ ...record, trends: { weekly: 'down', '4h': 'up' } }, schema);

    expect(normalized.trends).toEqual({ daily: '', weekly: 'down' });
  });

  it('renders rows in column order with blanks for missing values', () => {
    const schema = buildTableSchema('daily', TIMEFRAMES);

    expect(toTableView([record], schema)).toEqual({
      timeframe: 'daily',
      columns: schema.columns,
      rows: [
        [
          '2024-03-01T00:00:00',
          'Sell+',
          'trim',
          'MSFT',
          410.5,
          130.25,
          70,
          75.5,
          -1.2,
          -0.8,
          12,
          28,
          26.5,
          '',
          'down',
          '',
          '',
          '',
          '',
          '',
          '',
        ],
      ],
    });
  });
});
