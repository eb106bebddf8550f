import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { SYNTHESIS_QUEUE } from '../jobs/jobs.service';
import { LoggerService } from '../logger/logger.service';
import { describeError } from '../common/errors';

interface DependencyCheck {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    database: DependencyCheck;
    redis: DependencyCheck;
  };
  queues: Record<string, QueueStats | null>;
}

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(
    @InjectDataSource() private dataSource: DataSource,
    @InjectQueue(SYNTHESIS_QUEUE) private synthesisQueue: Queue,
    private logger: LoggerService,
  ) {
    this.logger.setContext('HealthService');
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const checks = {
      database: await this.checkDatabase(),
      redis: await this.checkRedis(),
    };

    const hasDown = Object.values(checks).some((c) => c.status === 'down');

    return {
      status: hasDown ? 'unhealthy' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      checks,
      queues: { [SYNTHESIS_QUEUE]: checks.redis.status === 'up' ? await this.getQueueStats() : null },
    };
  }

  private async checkDatabase(): Promise<DependencyCheck> {
    return this.timed('database', async () => {
      await this.dataSource.query('SELECT 1');
    });
  }

  private async checkRedis(): Promise<DependencyCheck> {
    // Queue counts fail when Redis is unreachable
    return this.timed('redis', async () => {
      await this.synthesisQueue.getWaitingCount();
    });
  }

  private async timed(name: string, probe: () => Promise<void>): Promise<DependencyCheck> {
    const start = Date.now();
    try {
      await probe();
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error: unknown) {
      const { message } = describeError(error);
      this.logger.warn(`Health check failed: ${name}`, { error: message });
      return { status: 'down', error: message };
    }
  }

  private async getQueueStats(): Promise<QueueStats | null> {
    try {
      const [waiting, active, completed, failed, delayed] = await Promise.all([
        this.synthesisQueue.getWaitingCount(),
        this.synthesisQueue.getActiveCount(),
        this.synthesisQueue.getCompletedCount(),
        this.synthesisQueue.getFailedCount(),
        this.synthesisQueue.getDelayedCount(),
      ]);
      return { waiting, active, completed, failed, delayed };
    } catch (error: unknown) {
      this.logger.warn('Could not read queue stats', { error: describeError(error).message });
      return null;
    }
  }
}
