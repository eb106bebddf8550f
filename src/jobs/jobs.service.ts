import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { LoggerService } from '../logger/logger.service';

export const SYNTHESIS_QUEUE = 'signal-synthesis';

export type SynthesisTrigger = 'schedule' | 'manual';

export interface SynthesisJobData {
  trigger: SynthesisTrigger;
  requestedAt: string;
}

@Injectable()
export class JobsService {
  constructor(
    @InjectQueue(SYNTHESIS_QUEUE) private synthesisQueue: Queue<SynthesisJobData>,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsService');
  }

  async enqueueSynthesis(trigger: SynthesisTrigger): Promise<{ jobId: string | undefined }> {
    const job = await this.synthesisQueue.add(
      'synthesize',
      { trigger, requestedAt: new Date().toISOString() },
      { removeOnComplete: 100, removeOnFail: 100 },
    );
    this.logger.log('Synthesis run enqueued', { jobId: job.id, trigger });
    return { jobId: job.id };
  }
}
