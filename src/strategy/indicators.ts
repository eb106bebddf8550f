import { ADX, CCI, Highest, Lowest, SMA } from 'technicalindicators';
import { Bar } from '../market-data/market-data.types';

export interface StochasticParams {
  /** Look-back of the raw %K high/low range. */
  window: number;
  kSmooth: number;
  dSmooth: number;
}

export interface IndicatorParams {
  stochastic: StochasticParams;
  cciPeriod: number;
  dmiPeriod: number;
  slopePeriod: number;
}

export interface IndicatorSeries {
  k: number[];
  d: number[];
  cci: number[];
  plusDi: number[];
  minusDi: number[];
  adx: number[];
}

export interface IndicatorSnapshot {
  time: string;
  close: number;
  k: number;
  d: number;
  cci: number;
  plusDi: number;
  minusDi: number;
  adx: number;
  slopeK: number;
  slopeD: number;
}

export interface OscillatorState {
  k: number;
  d: number;
}

const nanSeries = (length: number): number[] => new Array<number>(length).fill(NaN);

const finiteOrNaN = (value: number | undefined): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : NaN;

// technicalindicators drops warm-up positions, so its output lines up with the tail of the input
const alignRight = (values: ReadonlyArray<number | undefined>, length: number): number[] => {
  const out = nanSeries(length);
  const offset = length - values.length;
  values.forEach((value, i) => {
    if (offset + i >= 0) {
      out[offset + i] = finiteOrNaN(value);
    }
  });
  return out;
};

/**
 * Simple moving average that yields NaN for any window touching a NaN.
 * Each contiguous run of finite values is averaged on its own.
 */
export const smoothFinite = (values: readonly number[], period: number): number[] => {
  const out = nanSeries(values.length);
  let start = 0;

  while (start < values.length) {
    if (!Number.isFinite(values[start])) {
      start++;
      continue;
    }

    let end = start;
    while (end < values.length && Number.isFinite(values[end])) {
      end++;
    }

    const run = values.slice(start, end);
    if (run.length >= period) {
      const averages = SMA.calculate({ period, values: run });
      const first = start + period - 1;
      averages.forEach((avg, i) => {
        out[first + i] = finiteOrNaN(avg);
      });
    }
    start = end;
  }

  return out;
};

export const computeStochastic = (
  bars: readonly Bar[],
  { window, kSmooth, dSmooth }: StochasticParams,
): { k: number[]; d: number[] } => {
  const n = bars.length;
  if (n < window) {
    return { k: nanSeries(n), d: nanSeries(n) };
  }

  const lowest = alignRight(Lowest.calculate({ period: window, values: bars.map((b) => b.low) }), n);
  const highest = alignRight(Highest.calculate({ period: window, values: bars.map((b) => b.high) }), n);

  const rawK = bars.map((bar, i) => {
    const range = highest[i] - lowest[i];
    if (!Number.isFinite(range) || range === 0) {
      return NaN;
    }
    return (100 * (bar.close - lowest[i])) / range;
  });

  const k = smoothFinite(rawK, kSmooth);
  const d = smoothFinite(k, dSmooth);
  return { k, d };
};

/** Typical-price CCI with the 0.015 constant; a flat window has no mean deviation and yields NaN. */
export const computeCci = (bars: readonly Bar[], period: number): number[] => {
  const n = bars.length;
  if (n < period) {
    return nanSeries(n);
  }

  const values = CCI.calculate({
    high: bars.map((b) => b.high),
    low: bars.map((b) => b.low),
    close: bars.map((b) => b.close),
    period,
  });
  return alignRight(values, n);
};

export const computeDmi = (
  bars: readonly Bar[],
  period: number,
): { plusDi: number[]; minusDi: number[]; adx: number[] } => {
  const n = bars.length;
  if (n < period + 1) {
    return { plusDi: nanSeries(n), minusDi: nanSeries(n), adx: nanSeries(n) };
  }

  const rows = ADX.calculate({
    high: bars.map((b) => b.high),
    low: bars.map((b) => b.low),
    close: bars.map((b) => b.close),
    period,
  });

  return {
    plusDi: alignRight(rows.map((r) => r.pdi), n),
    minusDi: alignRight(rows.map((r) => r.mdi), n),
    adx: alignRight(rows.map((r) => r.adx), n),
  };
};

/**
 * Least-squares slope of the last `window` finite values against 0..window-1.
 */
export const regressionSlope = (series: readonly number[], window: number): number => {
  const y = series.filter((v) => Number.isFinite(v)).slice(-window);
  if (window < 2 || y.length < window) {
    return NaN;
  }

  const xMean = (window - 1) / 2;
  const yMean = y.reduce((sum, v) => sum + v, 0) / window;

  let numerator = 0;
  let denominator = 0;
  y.forEach((v, x) => {
    numerator += (x - xMean) * (v - yMean);
    denominator += (x - xMean) ** 2;
  });

  const slope = numerator / denominator;
  return Number.isFinite(slope) ? slope : NaN;
};

export const computeIndicatorSeries = (bars: readonly Bar[], params: IndicatorParams): IndicatorSeries => {
  const { k, d } = computeStochastic(bars, params.stochastic);
  const cci = computeCci(bars, params.cciPeriod);
  const { plusDi, minusDi, adx } = computeDmi(bars, params.dmiPeriod);
  return { k, d, cci, plusDi, minusDi, adx };
};

/**
 * Values at the most recent bar where %K, %D and CCI are all defined.
 * DMI values may still be NaN there; the classifier treats that as no signal.
 */
export const latestSnapshot = (
  bars: readonly Bar[],
  series: IndicatorSeries,
  slopePeriod: number,
): IndicatorSnapshot | null => {
  for (let i = bars.length - 1; i >= 0; i--) {
    if (!Number.isFinite(series.k[i]) || !Number.isFinite(series.d[i]) || !Number.isFinite(series.cci[i])) {
      continue;
    }

    return {
      time: bars[i].time,
      close: bars[i].close,
      k: series.k[i],
      d: series.d[i],
      cci: series.cci[i],
      plusDi: series.plusDi[i],
      minusDi: series.minusDi[i],
      adx: series.adx[i],
      slopeK: regressionSlope(series.k.slice(0, i + 1), slopePeriod),
      slopeD: regressionSlope(series.d.slice(0, i + 1), slopePeriod),
    };
  }
  return null;
};

export const latestOscillator = (series: IndicatorSeries): OscillatorState | null => {
  for (let i = series.k.length - 1; i >= 0; i--) {
    if (Number.isFinite(series.k[i]) && Number.isFinite(series.d[i])) {
      return { k: series.k[i], d: series.d[i] };
    }
  }
  return null;
};

/** Bars needed before every indicator can produce a value. */
export const requiredBars = (params: IndicatorParams): number =>
  Math.max(
    params.stochastic.window + params.stochastic.kSmooth + params.stochastic.dSmooth - 2,
    params.cciPeriod,
    params.dmiPeriod * 2,
  );
