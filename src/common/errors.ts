import { OscillatorState } from '../strategy/indicators';

export type PairFailureCode = 'data-unavailable' | 'insufficient-history' | 'computation-failed';

/**
 * Raised for a single (symbol, timeframe) pair. The synthesis run records the
 * pair as skipped and moves on.
 */
export class PairProcessingError extends Error {
  constructor(
    readonly code: PairFailureCode,
    readonly symbol: string,
    readonly timeframe: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DataUnavailableError extends PairProcessingError {
  constructor(symbol: string, timeframe: string, reason: string) {
    super('data-unavailable', symbol, timeframe, `No usable bars for ${symbol} (${timeframe}): ${reason}`);
  }
}

/**
 * No bar has a complete indicator snapshot. %K/%D may still be available, in
 * which case the pair keeps feeding sibling trend columns.
 */
export class InsufficientHistoryError extends PairProcessingError {
  constructor(
    symbol: string,
    timeframe: string,
    barCount: number,
    readonly oscillator: OscillatorState | null = null,
  ) {
    super(
      'insufficient-history',
      symbol,
      timeframe,
      `No valid indicator snapshot for ${symbol} (${timeframe}) from ${barCount} bar(s)`,
    );
  }
}

export class StoreReadError extends Error {
  constructor(readonly timeframe: string, readonly cause: unknown) {
    super(`Failed to read persisted table "${timeframe}": ${describeError(cause).message}`);
    this.name = 'StoreReadError';
  }
}

export class StoreWriteError extends Error {
  constructor(readonly timeframes: string[], readonly cause: unknown) {
    super(`Failed to persist tables [${timeframes.join(', ')}]: ${describeError(cause).message}`);
    this.name = 'StoreWriteError';
  }
}

export const describeError = (error: unknown): { message: string; stack?: string } => {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
};
