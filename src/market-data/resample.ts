import { Bar } from './market-data.types';

/**
 * Aggregates hourly bars into `hours`-wide buckets aligned to the start of each
 * local day (00:00, 04:00, ... for 4). Input must be in ascending time order.
 */
export function resampleBars(bars: readonly Bar[], hours: number): Bar[] {
  if (hours <= 1) {
    return bars.map((bar) => ({ ...bar }));
  }

  const buckets: Bar[] = [];
  for (const bar of bars) {
    const date = bar.time.slice(0, 10);
    const hour = Number(bar.time.slice(11, 13));
    const bucketHour = Math.floor(hour / hours) * hours;
    const key = `${date}T${String(bucketHour).padStart(2, '0')}:00:00`;

    const last = buckets[buckets.length - 1];
    if (!last || last.time !== key) {
      buckets.push({ ...bar, time: key });
      continue;
    }

    last.high = Math.max(last.high, bar.high);
    last.low = Math.min(last.low, bar.low);
    last.close = bar.close;
    if (bar.volume !== undefined) {
      last.volume = (last.volume ?? 0) + bar.volume;
    }
  }

  return buckets;
}
