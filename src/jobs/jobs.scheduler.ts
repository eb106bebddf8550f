import { Injectable } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { JobsService } from './jobs.service';
import { SettingsService } from '../settings/settings.service';
import { LoggerService } from '../logger/logger.service';
import { describeError } from '../common/errors';

@Injectable()
export class JobsScheduler {
  constructor(
    private jobsService: JobsService,
    private settingsService: SettingsService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsScheduler');
  }

  // @Cron takes no runtime values, so the cadence is checked in the handler
  @Cron('0 * * * *')
  async handleSynthesis() {
    await this.triggerIfDue(new Date());
  }

  async triggerIfDue(now: Date): Promise<boolean> {
    try {
      const cadenceHours = await this.settingsService.getSettingInt('SYNTHESIS_CADENCE_HOURS');
      const currentHour = now.getHours();

      if (currentHour % cadenceHours !== 0) {
        return false;
      }

      this.logger.log('Triggering scheduled synthesis', { cadenceHours, currentHour });
      await this.jobsService.enqueueSynthesis('schedule');
      return true;
    } catch (error: unknown) {
      const { message, stack } = describeError(error);
      this.logger.error('Failed to schedule synthesis', stack, { error: message });
      return false;
    }
  }
}
