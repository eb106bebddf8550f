import {
  buildOscillatorLookup,
  enrichWithTrends,
  siblingTimeframes,
  trendFromOscillator,
} from './trend-enricher';
import { EMPTY_JOURNAL, SignalRecord } from '../signals/signal-record';

const TIMEFRAMES = ['weekly', 'daily', '4h'];

const record = (token: string): SignalRecord => ({
  datetime: '2024-03-01T00:00:00',
  signal: 'Buy',
  token,
  notes: '',
  closePrice: 101.5,
  cci: -120.25,
  stochK: 30.5,
  stochD: 25.25,
  slopeK: 0.75,
  slopeD: 0.6,
  plusDi: 22,
  minusDi: 18,
  adx: 21,
  trends: {},
  ...EMPTY_JOURNAL,
});

describe('trend enrichment', () => {
  it('derives direction from %K against %D', () => {
    expect(trendFromOscillator({ k: 70, d: 40 })).toBe('up');
    expect(trendFromOscillator({ k: 40, d: 70 })).toBe('down');
    expect(trendFromOscillator({ k: 50, d: 50 })).toBe('');
    expect(trendFromOscillator({ k: NaN, d: 50 })).toBe('');
    expect(trendFromOscillator(undefined)).toBe('');
  });

  it('lists sibling timeframes in name order', () => {
    expect(siblingTimeframes('daily', TIMEFRAMES)).toEqual(['4h', 'weekly']);
    expect(siblingTimeframes('weekly', TIMEFRAMES)).toEqual(['4h', 'daily']);
  });

  it('attaches a trend for every sibling timeframe', () => {
    const lookup = buildOscillatorLookup([
      { symbol: 'AAPL', timeframe: 'weekly', oscillator: { k: 70, d: 40 } },
      { symbol: 'AAPL', timeframe: 'daily', oscillator: { k: 35, d: 30 } },
      { symbol: 'MSFT', timeframe: '4h', oscillator: { k: 10, d: 20 } },
    ]);

    const [aapl, msft] = enrichWithTrends([record('AAPL'), record('MSFT')], 'daily', TIMEFRAMES, lookup);

    expect(aapl.trends).toEqual({ '4h': '', weekly: 'up' });
    expect(msft.trends).toEqual({ '4h': 'down', weekly: '' });
  });

  it('leaves indicator values and the input untouched', () => {
    const input = record('AAPL');
    const lookup = buildOscillatorLookup([{ symbol: 'AAPL', timeframe: 'weekly', oscillator: { k: 70, d: 40 } }]);

    const [enriched] = enrichWithTrends([input], 'daily', TIMEFRAMES, lookup);

    expect(input.trends).toEqual({});
    expect({ ...enriched, trends: {} }).toEqual(input);
  });

  it('freezes lookup entries', () => {
    const oscillator = { k: 70, d: 40 };
    const lookup = buildOscillatorLookup([{ symbol: 'AAPL', timeframe: 'weekly', oscillator }]);
    oscillator.k = 10;

    const [enriched] = enrichWithTrends([record('AAPL')], 'daily', TIMEFRAMES, lookup);
    expect(enriched.trends.weekly).toBe('up');
    expect([...lookup.values()].every((entry) => Object.isFrozen(entry))).toBe(true);
  });
});
