import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { SynthesisModule } from '../synthesis/synthesis.module';
import { SettingsModule } from '../settings/settings.module';
import { SignalSynthesisProcessor } from './processors/signal-synthesis.processor';
import { JobsService, SYNTHESIS_QUEUE } from './jobs.service';
import { JobsScheduler } from './jobs.scheduler';
import { JobsController } from './jobs.controller';

@Module({
  imports: [BullModule.registerQueue({ name: SYNTHESIS_QUEUE }), SynthesisModule, SettingsModule],
  controllers: [JobsController],
  providers: [JobsService, JobsScheduler, SignalSynthesisProcessor],
  exports: [JobsService],
})
export class JobsModule {}
