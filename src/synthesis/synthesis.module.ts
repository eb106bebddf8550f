import { Module } from '@nestjs/common';
import { SynthesisService } from './synthesis.service';
import { StrategyModule } from '../strategy/strategy.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { AssetsModule } from '../assets/assets.module';
import { SignalsModule } from '../signals/signals.module';

@Module({
  imports: [StrategyModule, MarketDataModule, AssetsModule, SignalsModule],
  providers: [SynthesisService],
  exports: [SynthesisService],
})
export class SynthesisModule {}
