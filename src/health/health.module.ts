import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { HealthService } from './health.service';
import { HealthController } from './health.controller';
import { SYNTHESIS_QUEUE } from '../jobs/jobs.service';

@Module({
  imports: [
    // Register the queue to enable injection
    BullModule.registerQueue({ name: SYNTHESIS_QUEUE }),
  ],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
