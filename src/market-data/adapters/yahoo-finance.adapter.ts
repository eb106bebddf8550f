import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Bar } from '../market-data.types';
import { resampleBars } from '../resample';

interface YahooQuote {
  open?: (number | null)[];
  high?: (number | null)[];
  low?: (number | null)[];
  close?: (number | null)[];
  volume?: (number | null)[];
}

interface YahooChartResult {
  meta?: { symbol?: string; gmtoffset?: number; exchangeTimezoneName?: string };
  timestamp?: number[];
  indicators?: { quote?: YahooQuote[] };
}

export interface YahooChartResponse {
  chart?: {
    result?: YahooChartResult[] | null;
    error?: { code?: string; description?: string } | null;
  };
}

// Intervals the chart endpoint serves directly
const NATIVE_INTERVALS = new Set(['1m', '2m', '5m', '15m', '30m', '60m', '90m', '1h', '1d', '5d', '1wk', '1mo', '3mo']);

export interface IntervalPlan {
  fetchInterval: string;
  resampleHours: number;
}

export function planInterval(interval: string): IntervalPlan {
  if (NATIVE_INTERVALS.has(interval)) {
    return { fetchInterval: interval, resampleHours: 1 };
  }
  const hourly = /^(\d+)h$/.exec(interval);
  if (hourly && Number(hourly[1]) > 1 && 24 % Number(hourly[1]) === 0) {
    return { fetchInterval: '1h', resampleHours: Number(hourly[1]) };
  }
  throw new Error(`Unsupported interval: ${interval}`);
}

// Intervals whose bars stand for a whole session or longer
const SESSION_INTERVALS = new Set(['1d', '5d', '1wk', '1mo', '3mo']);

const exchangeFormatters = new Map<string, Intl.DateTimeFormat>();

function exchangeFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = exchangeFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    exchangeFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Wall-clock time of an epoch in the exchange's zone, so bars on either side
 * of a DST change keep their local session times. Without a zone name the
 * payload's single gmtoffset is used.
 */
export function toExchangeTime(epochSeconds: number, timeZone: string | undefined, gmtOffsetSeconds = 0): string {
  if (!timeZone) {
    return new Date((epochSeconds + gmtOffsetSeconds) * 1000).toISOString().slice(0, 19);
  }
  const parts = exchangeFormatter(timeZone).formatToParts(new Date(epochSeconds * 1000));
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00';
  return `${get('year')}-${get('month')}-${get('day')}T${get('hour')}:${get('minute')}:${get('second')}`;
}

/**
 * Converts a chart payload into ascending bars stamped with exchange-local
 * wall-clock time. Session-or-longer bars are stamped with the session date
 * at midnight, since the live bar carries the latest trade time. Rows with
 * any missing OHLC value are dropped.
 */
export function parseChartResponse(payload: YahooChartResponse, interval: string): Bar[] {
  const chartError = payload.chart?.error;
  if (chartError) {
    throw new Error(`Yahoo chart error: ${chartError.description ?? chartError.code ?? 'unknown'}`);
  }

  const result = payload.chart?.result?.[0];
  const timestamps = result?.timestamp;
  const quote = result?.indicators?.quote?.[0];
  if (!result || !timestamps || !quote) {
    return [];
  }

  const timeZone = result.meta?.exchangeTimezoneName;
  const gmtOffset = result.meta?.gmtoffset ?? 0;
  const sessionBars = SESSION_INTERVALS.has(interval);
  const stamp = (ts: number): string => {
    const local = toExchangeTime(ts, timeZone, gmtOffset);
    return sessionBars ? `${local.slice(0, 10)}T00:00:00` : local;
  };

  const bars: Bar[] = [];

  timestamps.forEach((ts, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (open == null || high == null || low == null || close == null) {
      return;
    }
    const volume = quote.volume?.[i];
    bars.push({
      time: stamp(ts),
      open,
      high,
      low,
      close,
      ...(volume != null ? { volume } : {}),
    });
  });

  bars.sort((a, b) => a.time.localeCompare(b.time));
  return bars;
}

@Injectable()
export class YahooFinanceAdapter {
  private baseUrl: string;

  constructor(private configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('MARKET_DATA_BASE_URL') || 'https://query1.finance.yahoo.com';
  }

  async getBars(symbol: string, interval: string, range: string): Promise<Bar[]> {
    const plan = planInterval(interval);
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`;

    const response = await axios.get<YahooChartResponse>(url, {
      params: { interval: plan.fetchInterval, range, includePrePost: false },
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; signal-synthesis)' },
      timeout: 15000,
    });

    return resampleBars(parseChartResponse(response.data, plan.fetchInterval), plan.resampleHours);
  }
}
