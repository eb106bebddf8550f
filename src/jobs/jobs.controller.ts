import { Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { JobsService } from './jobs.service';

@Controller('api/signals')
export class JobsController {
  constructor(private jobsService: JobsService) {}

  @Post('run')
  @HttpCode(HttpStatus.ACCEPTED)
  async run() {
    const { jobId } = await this.jobsService.enqueueSynthesis('manual');
    return { queued: true, jobId };
  }
}
