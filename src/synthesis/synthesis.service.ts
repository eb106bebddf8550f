import { Injectable } from '@nestjs/common';
import { StrategyService, SignalParameters } from '../strategy/strategy.service';
import { MarketDataService } from '../market-data/market-data.service';
import { AssetsService } from '../assets/assets.service';
import { SignalTableStore } from '../signals/signal-table.store';
import { SignalRecord } from '../signals/signal-record';
import { reconcileTable } from '../signals/reconciliation';
import { buildOscillatorLookup, enrichWithTrends, OscillatorEntry } from '../strategy/trend-enricher';
import { TIMEFRAMES, TIMEFRAME_NAMES } from '../config/timeframes.config';
import { describeError, InsufficientHistoryError, PairFailureCode, PairProcessingError } from '../common/errors';
import { LoggerService } from '../logger/logger.service';

export interface SkippedPair {
  symbol: string;
  timeframe: string;
  code: PairFailureCode;
  reason: string;
}

export interface TimeframeRunSummary {
  timeframe: string;
  /** Signals emitted by this run. */
  emitted: number;
  /** Rows read from the store before merging. */
  previous: number;
  /** Rows written after merging. */
  persisted: number;
}

export interface SynthesisRunSummary {
  startedAt: string;
  finishedAt: string;
  symbols: number;
  timeframes: TimeframeRunSummary[];
  skipped: SkippedPair[];
}

interface ComputeResult {
  emitted: Map<string, SignalRecord[]>;
  oscillators: OscillatorEntry[];
  skipped: SkippedPair[];
}

@Injectable()
export class SynthesisService {
  constructor(
    private strategyService: StrategyService,
    private marketDataService: MarketDataService,
    private assetsService: AssetsService,
    private store: SignalTableStore,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SynthesisService');
  }

  /**
   * One full pass: compute every pair, then enrich, merge and persist every
   * timeframe in a single write. A failed write leaves the store as it was.
   */
  async run(): Promise<SynthesisRunSummary> {
    const startedAt = new Date();
    const params = await this.strategyService.getSignalParameters();
    const symbols = await this.assetsService.getUniverse();

    this.logger.log(`Synthesis started for ${symbols.length} symbol(s)`, {
      symbols,
      timeframes: TIMEFRAME_NAMES,
    });

    const { emitted, oscillators, skipped } = await this.computeSignals(symbols, params);

    // Every pair has been computed; trends read from a fixed snapshot from here on
    const lookup = buildOscillatorLookup(oscillators);

    const tables = new Map<string, SignalRecord[]>();
    const summaries: TimeframeRunSummary[] = [];

    for (const { name } of TIMEFRAMES) {
      const incoming = enrichWithTrends(emitted.get(name) ?? [], name, TIMEFRAME_NAMES, lookup);
      const previous = await this.readPrevious(name);
      const table = reconcileTable({ timeframe: name, timeframes: TIMEFRAME_NAMES, incoming, previous });

      tables.set(name, table);
      summaries.push({ timeframe: name, emitted: incoming.length, previous: previous.length, persisted: table.length });
    }

    await this.store.writeTables(tables);

    const summary: SynthesisRunSummary = {
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      symbols: symbols.length,
      timeframes: summaries,
      skipped,
    };

    this.logger.log('Synthesis completed', {
      durationMs: Date.now() - startedAt.getTime(),
      timeframes: summaries,
      skipped: skipped.length,
    });
    return summary;
  }

  private async computeSignals(symbols: readonly string[], params: SignalParameters): Promise<ComputeResult> {
    const emitted = new Map<string, SignalRecord[]>(TIMEFRAME_NAMES.map((name) => [name, []]));
    const oscillators: OscillatorEntry[] = [];
    const skipped: SkippedPair[] = [];

    for (const symbol of symbols) {
      for (const timeframe of TIMEFRAMES) {
        try {
          const bars = await this.marketDataService.getBars(symbol, timeframe);
          const evaluation = this.strategyService.evaluatePair(symbol, timeframe.name, bars, params);

          if (evaluation.oscillator) {
            oscillators.push({ symbol, timeframe: timeframe.name, oscillator: evaluation.oscillator });
          }
          if (evaluation.record) {
            emitted.get(timeframe.name)?.push(evaluation.record);
          }
        } catch (error: unknown) {
          // No signal, but %K/%D still describe this pair's trend for its siblings
          if (error instanceof InsufficientHistoryError && error.oscillator) {
            oscillators.push({ symbol, timeframe: timeframe.name, oscillator: error.oscillator });
          }
          skipped.push(this.recordSkip(symbol, timeframe.name, error));
        }
      }
    }

    return { emitted, oscillators, skipped };
  }

  private recordSkip(symbol: string, timeframe: string, error: unknown): SkippedPair {
    if (error instanceof PairProcessingError) {
      this.logger.warn(`Skipping ${symbol} (${timeframe})`, { code: error.code, reason: error.message });
      return { symbol, timeframe, code: error.code, reason: error.message };
    }

    const { message, stack } = describeError(error);
    this.logger.error(`Failed to evaluate ${symbol} (${timeframe})`, stack, { symbol, timeframe });
    return { symbol, timeframe, code: 'computation-failed', reason: message };
  }

  private async readPrevious(timeframe: string): Promise<SignalRecord[]> {
    try {
      return await this.store.readTable(timeframe);
    } catch (error: unknown) {
      this.logger.warn(`Previous ${timeframe} table unreadable, starting empty`, {
        reason: describeError(error).message,
      });
      return [];
    }
  }
}
