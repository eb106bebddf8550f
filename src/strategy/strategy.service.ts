import { Injectable } from '@nestjs/common';
import { SettingsService } from '../settings/settings.service';
import { LoggerService } from '../logger/logger.service';
import { Bar } from '../market-data/market-data.types';
import { InsufficientHistoryError } from '../common/errors';
import { EMPTY_JOURNAL, SignalRecord } from '../signals/signal-record';
import {
  computeIndicatorSeries,
  IndicatorParams,
  IndicatorSnapshot,
  latestOscillator,
  latestSnapshot,
  OscillatorState,
  requiredBars,
} from './indicators';
import { classifySignal, ClassifierThresholds } from './signal-classifier';

export interface SignalParameters {
  indicators: IndicatorParams;
  thresholds: ClassifierThresholds;
  /** Store ADX as a negative number when -DI dominates. */
  signedAdx: boolean;
}

export interface PairEvaluation {
  symbol: string;
  timeframe: string;
  snapshot: IndicatorSnapshot;
  oscillator: OscillatorState | null;
  /** null when the pair classifies as neutral. */
  record: SignalRecord | null;
}

const finiteOrNull = (value: number): number | null => (Number.isFinite(value) ? value : null);

@Injectable()
export class StrategyService {
  constructor(
    private settingsService: SettingsService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('StrategyService');
  }

  async getSignalParameters(): Promise<SignalParameters> {
    const settings = await this.settingsService.getSignalSettings();
    return {
      indicators: {
        stochastic: {
          window: settings.stochWindow,
          kSmooth: settings.stochKSmooth,
          dSmooth: settings.stochDSmooth,
        },
        cciPeriod: settings.cciPeriod,
        dmiPeriod: settings.dmiPeriod,
        slopePeriod: settings.slopePeriod,
      },
      thresholds: {
        adxThreshold: settings.adxThreshold,
        slopeThreshold: settings.slopeThreshold,
      },
      signedAdx: settings.signedAdx,
    };
  }

  /**
   * Computes indicators for one (symbol, timeframe) and classifies the most
   * recent bar with a complete oscillator reading.
   */
  evaluatePair(symbol: string, timeframe: string, bars: readonly Bar[], params: SignalParameters): PairEvaluation {
    const series = computeIndicatorSeries(bars, params.indicators);
    const snapshot = latestSnapshot(bars, series, params.indicators.slopePeriod);
    const oscillator = latestOscillator(series);

    if (!snapshot) {
      this.logger.debug(`Not enough history for ${symbol} (${timeframe})`, {
        bars: bars.length,
        required: requiredBars(params.indicators),
        hasOscillator: oscillator !== null,
      });
      throw new InsufficientHistoryError(symbol, timeframe, bars.length, oscillator);
    }

    const signal = classifySignal(snapshot, params.thresholds);

    this.logger.debug(`Evaluated ${symbol} (${timeframe})`, {
      time: snapshot.time,
      signal: signal ?? 'neutral',
      k: snapshot.k,
      d: snapshot.d,
      cci: snapshot.cci,
      adx: snapshot.adx,
    });

    if (!signal) {
      return { symbol, timeframe, snapshot, oscillator, record: null };
    }

    const adx = params.signedAdx && snapshot.minusDi > snapshot.plusDi ? -snapshot.adx : snapshot.adx;

    const record: SignalRecord = {
      datetime: snapshot.time,
      signal,
      token: symbol,
      notes: '',
      closePrice: finiteOrNull(snapshot.close),
      cci: finiteOrNull(snapshot.cci),
      stochK: finiteOrNull(snapshot.k),
      stochD: finiteOrNull(snapshot.d),
      slopeK: finiteOrNull(snapshot.slopeK),
      slopeD: finiteOrNull(snapshot.slopeD),
      plusDi: finiteOrNull(snapshot.plusDi),
      minusDi: finiteOrNull(snapshot.minusDi),
      adx: finiteOrNull(adx),
      trends: {},
      ...EMPTY_JOURNAL,
    };

    return { symbol, timeframe, snapshot, oscillator, record };
  }
}
