export interface TimeframeConfig {
  name: string;
  /** Bar interval requested from the market-data provider, e.g. 1d, 1wk, 4h. */
  interval: string;
  /** Lookback range, e.g. 1y, 90d. */
  period: string;
}

export const TIMEFRAMES: readonly TimeframeConfig[] = [
  { name: 'weekly', interval: '1wk', period: '3y' },
  { name: 'daily', interval: '1d', period: '1y' },
  { name: '4h', interval: '4h', period: '90d' },
];

export const TIMEFRAME_NAMES: readonly string[] = TIMEFRAMES.map((tf) => tf.name);

export const findTimeframe = (name: string): TimeframeConfig | undefined =>
  TIMEFRAMES.find((tf) => tf.name === name);
