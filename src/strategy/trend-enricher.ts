import { SignalRecord, TrendDirection } from '../signals/signal-record';
import { OscillatorState } from './indicators';

export interface OscillatorEntry {
  symbol: string;
  timeframe: string;
  oscillator: OscillatorState;
}

export type OscillatorLookup = ReadonlyMap<string, Readonly<OscillatorState>>;

const lookupKey = (symbol: string, timeframe: string): string => `${timeframe}\u0000${symbol}`;

/**
 * Freezes the latest %K/%D of every evaluated pair, neutral pairs included.
 * Built once after all pairs are computed; enrichment only reads it.
 */
export const buildOscillatorLookup = (entries: Iterable<OscillatorEntry>): OscillatorLookup => {
  const lookup = new Map<string, Readonly<OscillatorState>>();
  for (const { symbol, timeframe, oscillator } of entries) {
    lookup.set(lookupKey(symbol, timeframe), Object.freeze({ k: oscillator.k, d: oscillator.d }));
  }
  return lookup;
};

export const trendFromOscillator = (oscillator: OscillatorState | undefined): TrendDirection => {
  if (!oscillator || Number.isNaN(oscillator.k) || Number.isNaN(oscillator.d)) {
    return '';
  }
  if (oscillator.k > oscillator.d) return 'up';
  if (oscillator.k < oscillator.d) return 'down';
  return '';
};

export const siblingTimeframes = (timeframe: string, timeframes: readonly string[]): string[] =>
  timeframes.filter((tf) => tf !== timeframe).sort();

export const enrichWithTrends = (
  records: readonly SignalRecord[],
  timeframe: string,
  timeframes: readonly string[],
  lookup: OscillatorLookup,
): SignalRecord[] => {
  const siblings = siblingTimeframes(timeframe, timeframes);
  return records.map((record) => {
    const trends: Record<string, TrendDirection> = { ...record.trends };
    for (const sibling of siblings) {
      trends[sibling] = trendFromOscillator(lookup.get(lookupKey(record.token, sibling)));
    }
    return { ...record, trends };
  });
};
