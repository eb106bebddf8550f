import { Test, TestingModule } from '@nestjs/testing';
import { JobsScheduler } from './jobs.scheduler';
import { JobsService } from './jobs.service';
import { SettingsService } from '../settings/settings.service';
import { LoggerService } from '../logger/logger.service';

describe('JobsScheduler', () => {
  let scheduler: JobsScheduler;
  let jobsService: jest.Mocked<JobsService>;
  let settingsService: jest.Mocked<SettingsService>;

  const at = (hour: number) => new Date(2024, 2, 1, hour, 0, 0);

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JobsScheduler,
        { provide: JobsService, useValue: { enqueueSynthesis: jest.fn().mockResolvedValue({ jobId: '1' }) } },
        { provide: SettingsService, useValue: { getSettingInt: jest.fn().mockResolvedValue(4) } },
        {
          provide: LoggerService,
          useValue: { setContext: jest.fn(), log: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() },
        },
      ],
    }).compile();

    scheduler = module.get<JobsScheduler>(JobsScheduler);
    jobsService = module.get(JobsService);
    settingsService = module.get(SettingsService);
  });

  it('enqueues on hours divisible by the cadence', async () => {
    await expect(scheduler.triggerIfDue(at(8))).resolves.toBe(true);
    expect(settingsService.getSettingInt).toHaveBeenCalledWith('SYNTHESIS_CADENCE_HOURS');
    expect(jobsService.enqueueSynthesis).toHaveBeenCalledWith('schedule');
  });

  it('skips other hours', async () => {
    await expect(scheduler.triggerIfDue(at(9))).resolves.toBe(false);
    expect(jobsService.enqueueSynthesis).not.toHaveBeenCalled();
  });

  it('does not throw when the queue is unavailable', async () => {
    jobsService.enqueueSynthesis.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(scheduler.triggerIfDue(at(0))).resolves.toBe(false);
  });
});
