import { Test, TestingModule } from '@nestjs/testing';
import { SignalSynthesisProcessor } from './signal-synthesis.processor';
import { SynthesisService, SynthesisRunSummary } from '../../synthesis/synthesis.service';
import { LoggerService } from '../../logger/logger.service';

describe('SignalSynthesisProcessor', () => {
  let processor: SignalSynthesisProcessor;
  let synthesisService: jest.Mocked<SynthesisService>;
  let logger: { setContext: jest.Mock; log: jest.Mock; error: jest.Mock; warn: jest.Mock; debug: jest.Mock };

  const job = {
    id: 'job-123',
    data: { trigger: 'manual' as const, requestedAt: '2024-03-01T12:00:00.000Z' },
    attemptsMade: 0,
  };

  const summary: SynthesisRunSummary = {
    startedAt: '2024-03-01T12:00:00.000Z',
    finishedAt: '2024-03-01T12:00:05.000Z',
    symbols: 2,
    timeframes: [
      { timeframe: 'weekly', emitted: 0, previous: 3, persisted: 3 },
      { timeframe: 'daily', emitted: 1, previous: 4, persisted: 5 },
      { timeframe: '4h', emitted: 2, previous: 0, persisted: 2 },
    ],
    skipped: [],
  };

  beforeEach(async () => {
    logger = { setContext: jest.fn(), log: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SignalSynthesisProcessor,
        { provide: SynthesisService, useValue: { run: jest.fn() } },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile();

    processor = module.get<SignalSynthesisProcessor>(SignalSynthesisProcessor);
    synthesisService = module.get(SynthesisService);
  });

  it('runs one synthesis per job and returns its summary', async () => {
    synthesisService.run.mockResolvedValue(summary);

    await expect(processor.process(job)).resolves.toBe(summary);
    expect(synthesisService.run).toHaveBeenCalledTimes(1);
    expect(logger.log).toHaveBeenCalledWith('Synthesis run finished', {
      jobId: 'job-123',
      persisted: 'weekly:3 daily:5 4h:2',
      skipped: 0,
    });
  });

  it('rethrows so the queue marks the job failed', async () => {
    const failure = new Error('Failed to persist tables [weekly, daily, 4h]: deadlock detected');
    synthesisService.run.mockRejectedValue(failure);

    await expect(processor.process(job)).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith('Synthesis run failed', failure.stack, {
      jobId: 'job-123',
      error: failure.message,
    });
  });
});
