import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { Injectable } from '@nestjs/common';
import { SynthesisService, SynthesisRunSummary } from '../../synthesis/synthesis.service';
import { LoggerService } from '../../logger/logger.service';
import { describeError } from '../../common/errors';
import { SYNTHESIS_QUEUE, SynthesisJobData } from '../jobs.service';

// One job at a time: a run reads and rewrites the whole store
@Processor(SYNTHESIS_QUEUE, { concurrency: 1 })
@Injectable()
export class SignalSynthesisProcessor extends WorkerHost {
  constructor(
    private synthesisService: SynthesisService,
    private logger: LoggerService,
  ) {
    super();
    this.logger.setContext('SignalSynthesisProcessor');
  }

  async process(job: Pick<Job<SynthesisJobData>, 'id' | 'data' | 'attemptsMade'>): Promise<SynthesisRunSummary> {
    this.logger.log('Starting synthesis run', {
      jobId: job.id,
      trigger: job.data.trigger,
      attempt: job.attemptsMade + 1,
    });

    try {
      const summary = await this.synthesisService.run();
      this.logger.log('Synthesis run finished', {
        jobId: job.id,
        persisted: summary.timeframes.map((t) => `${t.timeframe}:${t.persisted}`).join(' '),
        skipped: summary.skipped.length,
      });
      return summary;
    } catch (error: unknown) {
      const { message, stack } = describeError(error);
      this.logger.error('Synthesis run failed', stack, { jobId: job.id, error: message });
      throw error;
    }
  }
}
