import { parseChartResponse, planInterval, toExchangeTime, YahooChartResponse } from './yahoo-finance.adapter';

describe('YahooFinanceAdapter helpers', () => {
  describe('planInterval', () => {
    it('passes native intervals through', () => {
      expect(planInterval('1d')).toEqual({ fetchInterval: '1d', resampleHours: 1 });
      expect(planInterval('1wk')).toEqual({ fetchInterval: '1wk', resampleHours: 1 });
    });

    it('builds multi-hour intervals from hourly bars', () => {
      expect(planInterval('4h')).toEqual({ fetchInterval: '1h', resampleHours: 4 });
    });

    it('rejects intervals that do not divide a day', () => {
      expect(() => planInterval('7h')).toThrow('Unsupported interval: 7h');
      expect(() => planInterval('fortnight')).toThrow('Unsupported interval: fortnight');
    });
  });

  describe('parseChartResponse', () => {
    // 2024-01-02T14:30:00Z, New York is UTC-5
    const base = 1704205800;

    const payload: YahooChartResponse = {
      chart: {
        result: [
          {
            meta: { symbol: 'AAPL', gmtoffset: -18000 },
            timestamp: [base, base + 3600, base + 7200],
            indicators: {
              quote: [
                {
                  open: [10, 11, 12],
                  high: [11, 12, 13],
                  low: [9, 10, 11],
                  close: [10.5, null, 12.5],
                  volume: [100, 200, null],
                },
              ],
            },
          },
        ],
        error: null,
      },
    };

    it('stamps bars with exchange-local time and drops incomplete rows', () => {
      expect(parseChartResponse(payload, '1h')).toEqual([
        { time: '2024-01-02T09:30:00', open: 10, high: 11, low: 9, close: 10.5, volume: 100 },
        { time: '2024-01-02T11:30:00', open: 12, high: 13, low: 11, close: 12.5 },
      ]);
    });

    it('returns no bars when the result is empty', () => {
      expect(parseChartResponse({ chart: { result: [], error: null } }, '1d')).toEqual([]);
      expect(parseChartResponse({}, '1d')).toEqual([]);
    });

    it('throws on a chart error', () => {
      expect(() =>
        parseChartResponse({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } }, '1d'),
      ).toThrow('Yahoo chart error: No data found');
    });

    const chart = (timestamps: number[], gmtoffset: number): YahooChartResponse => ({
      chart: {
        result: [
          {
            meta: { symbol: 'AAPL', gmtoffset, exchangeTimezoneName: 'America/New_York' },
            timestamp: timestamps,
            indicators: {
              quote: [
                {
                  open: timestamps.map(() => 10),
                  high: timestamps.map(() => 11),
                  low: timestamps.map(() => 9),
                  close: timestamps.map(() => 10.5),
                },
              ],
            },
          },
        ],
        error: null,
      },
    });

    it('keeps local session times on both sides of a DST change', () => {
      // 2024-01-02T14:30Z (EST) and 2024-07-01T13:30Z (EDT); payload offset is the summer one
      const bars = parseChartResponse(chart([1704205800, 1719840600], -14400), '1h');

      expect(bars.map((b) => b.time)).toEqual(['2024-01-02T09:30:00', '2024-07-01T09:30:00']);
    });

    it('stamps the live daily bar with its session date', () => {
      // Same session fetched at 12:47:12 and 14:02:40 New York time
      const morning = parseChartResponse(chart([1709562600, 1709660832], -18000), '1d');
      const afternoon = parseChartResponse(chart([1709562600, 1709665360], -18000), '1d');

      expect(morning.map((b) => b.time)).toEqual(['2024-03-04T00:00:00', '2024-03-05T00:00:00']);
      expect(afternoon.map((b) => b.time)).toEqual(morning.map((b) => b.time));
    });

    it('takes the session date in the exchange zone, not UTC', () => {
      // 2024-03-05T02:00Z is the evening of March 4 in New York
      expect(parseChartResponse(chart([1709604000], -18000), '1wk').map((b) => b.time)).toEqual([
        '2024-03-04T00:00:00',
      ]);
    });
  });

  describe('toExchangeTime', () => {
    it('converts through the named zone', () => {
      expect(toExchangeTime(1709604000, 'America/New_York')).toBe('2024-03-04T21:00:00');
    });

    it('falls back to the fixed offset without a zone name', () => {
      expect(toExchangeTime(1704205800, undefined, -18000)).toBe('2024-01-02T09:30:00');
    });
  });
});
