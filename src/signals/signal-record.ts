export type SignalState = 'Buy+' | 'Buy' | 'Buy-' | 'Sell+' | 'Sell' | 'Sell-';

export const SIGNAL_STATES: readonly SignalState[] = ['Buy+', 'Buy', 'Buy-', 'Sell+', 'Sell', 'Sell-'];

export type TrendDirection = 'up' | 'down' | '';

export type TradeType = 'Buy' | 'Sell' | '';

export interface TradeJournal {
  tradeType: TradeType;
  entryPrice: number | null;
  targetExitPrice: number | null;
  exitPrice: number | null;
  pnl: number | null;
  pnlPct: number | null;
}

export interface SignalRecord extends TradeJournal {
  /** Timezone-naive `YYYY-MM-DDTHH:mm:ss` of the bar the signal was read from. */
  datetime: string;
  signal: SignalState;
  token: string;
  notes: string;
  closePrice: number | null;
  cci: number | null;
  stochK: number | null;
  stochD: number | null;
  slopeK: number | null;
  slopeD: number | null;
  plusDi: number | null;
  minusDi: number | null;
  /** Negative when -DI dominates and signed ADX is enabled. */
  adx: number | null;
  /** Keyed by sibling timeframe name. */
  trends: Record<string, TrendDirection>;
}

export type SignalIdentity = Pick<SignalRecord, 'datetime' | 'token' | 'signal'>;

export const INDICATOR_FIELDS = [
  'closePrice',
  'cci',
  'stochK',
  'stochD',
  'slopeK',
  'slopeD',
  'plusDi',
  'minusDi',
  'adx',
] as const;

export type IndicatorField = (typeof INDICATOR_FIELDS)[number];

export const EMPTY_JOURNAL: Readonly<TradeJournal> = {
  tradeType: '',
  entryPrice: null,
  targetExitPrice: null,
  exitPrice: null,
  pnl: null,
  pnlPct: null,
};

export const identityKey = (record: SignalIdentity): string =>
  JSON.stringify([record.datetime, record.token, record.signal]);

export const pickJournal = (record: TradeJournal): TradeJournal => ({
  tradeType: record.tradeType,
  entryPrice: record.entryPrice,
  targetExitPrice: record.targetExitPrice,
  exitPrice: record.exitPrice,
  pnl: record.pnl,
  pnlPct: record.pnlPct,
});
