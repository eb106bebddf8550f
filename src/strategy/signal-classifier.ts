import { SignalState } from '../signals/signal-record';
import { IndicatorSnapshot } from './indicators';

export interface ClassifierThresholds {
  adxThreshold: number;
  slopeThreshold: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ClassifierThresholds> = {
  adxThreshold: 20,
  slopeThreshold: 0.5,
};

type ClassifierInput = Pick<IndicatorSnapshot, 'k' | 'd' | 'cci' | 'plusDi' | 'minusDi' | 'adx' | 'slopeK' | 'slopeD'>;

/**
 * Maps the latest indicator snapshot to a tradable state.
 * Returns null for neutral: neutral pairs are never persisted.
 */
export const classifySignal = (
  snapshot: ClassifierInput,
  { adxThreshold, slopeThreshold }: ClassifierThresholds = DEFAULT_THRESHOLDS,
): SignalState | null => {
  const { k, d, cci, plusDi, minusDi, adx, slopeK, slopeD } = snapshot;
  if ([k, d, cci, adx, plusDi, minusDi].some((v) => Number.isNaN(v))) {
    return null;
  }

  const kAboveD = k > d;
  const kBelowD = k < d;
  // CCI reads as a pullback signal: oversold on the buy side, overbought on the sell side
  const cciBullish = cci < -100;
  const cciBearish = cci > 100;
  const dmiBullish = plusDi > minusDi && adx > adxThreshold;
  const dmiBearish = minusDi > plusDi && adx > adxThreshold;
  // NaN slopes compare false, so missing slope history never counts as strong
  const strongSlopes = Math.abs(slopeK) > slopeThreshold && Math.abs(slopeD) > slopeThreshold;

  if (kAboveD && cciBullish) {
    if (dmiBullish && strongSlopes) return 'Buy+';
    if (!dmiBearish) return 'Buy';
    return null;
  }

  if (kBelowD && cciBearish) {
    if (dmiBearish && strongSlopes) return 'Sell+';
    if (!dmiBullish) return 'Sell';
    return null;
  }

  return null;
};
