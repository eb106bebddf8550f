import { Module } from '@nestjs/common';
import { StrategyService } from './strategy.service';
import { SettingsModule } from '../settings/settings.module';

@Module({
  imports: [SettingsModule],
  providers: [StrategyService],
  exports: [StrategyService],
})
export class StrategyModule {}
