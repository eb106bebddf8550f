import { Injectable } from '@nestjs/common';
import { isAxiosError } from 'axios';
import { YahooFinanceAdapter } from './adapters/yahoo-finance.adapter';
import { Bar } from './market-data.types';
import { TimeframeConfig } from '../config/timeframes.config';
import { DataUnavailableError, describeError } from '../common/errors';
import { LoggerService } from '../logger/logger.service';

@Injectable()
export class MarketDataService {
  constructor(
    private adapter: YahooFinanceAdapter,
    private logger: LoggerService,
  ) {
    this.logger.setContext('MarketDataService');
  }

  /**
   * Bars for one symbol over the timeframe's lookback, oldest first.
   * Throws DataUnavailableError when the provider fails or returns nothing.
   */
  async getBars(symbol: string, timeframe: TimeframeConfig): Promise<Bar[]> {
    let bars: Bar[];
    try {
      bars = await this.adapter.getBars(symbol, timeframe.interval, timeframe.period);
    } catch (error: unknown) {
      const reason = isAxiosError(error) && error.response
        ? `HTTP ${error.response.status}`
        : describeError(error).message;
      throw new DataUnavailableError(symbol, timeframe.name, reason);
    }

    if (bars.length === 0) {
      throw new DataUnavailableError(symbol, timeframe.name, 'empty response');
    }

    this.logger.debug(`Fetched ${bars.length} bars`, {
      symbol,
      timeframe: timeframe.name,
      first: bars[0].time,
      last: bars[bars.length - 1].time,
    });
    return bars;
  }
}
