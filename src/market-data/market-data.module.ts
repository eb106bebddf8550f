import { Module } from '@nestjs/common';
import { MarketDataService } from './market-data.service';
import { YahooFinanceAdapter } from './adapters/yahoo-finance.adapter';

@Module({
  providers: [MarketDataService, YahooFinanceAdapter],
  exports: [MarketDataService],
})
export class MarketDataModule {}
