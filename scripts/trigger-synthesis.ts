import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { JobsService } from '../src/jobs/jobs.service';
import { SynthesisService } from '../src/synthesis/synthesis.service';

// Usage: trigger-synthesis [--inline]
// --inline runs the pass in this process instead of queueing it
async function triggerSynthesis() {
  const inline = process.argv.includes('--inline');
  const app = await NestFactory.createApplicationContext(AppModule);

  console.log('\n=== SIGNAL SYNTHESIS ===\n');

  try {
    if (!inline) {
      const { jobId } = await app.get(JobsService).enqueueSynthesis('manual');
      console.log(`Synthesis job enqueued (id: ${jobId ?? 'unknown'})`);
      return;
    }

    const summary = await app.get(SynthesisService).run();
    console.log(`Symbols: ${summary.symbols}`);
    for (const table of summary.timeframes) {
      console.log(`  ${table.timeframe}: ${table.emitted} emitted, ${table.previous} previous, ${table.persisted} persisted`);
    }
    if (summary.skipped.length > 0) {
      console.log(`\nSkipped ${summary.skipped.length} pair(s):`);
      for (const skip of summary.skipped) {
        console.log(`  ${skip.symbol} ${skip.timeframe} [${skip.code}] ${skip.reason}`);
      }
    }
    console.log('');
  } finally {
    await app.close();
  }
}

triggerSynthesis().catch((error: unknown) => {
  console.error('Synthesis trigger failed:', error);
  process.exitCode = 1;
});
