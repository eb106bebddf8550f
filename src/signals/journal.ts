import { SignalRecord, TradeType } from './signal-record';

export interface JournalPatch {
  notes?: string;
  tradeType?: TradeType;
  entryPrice?: number | null;
  targetExitPrice?: number | null;
  exitPrice?: number | null;
}

export class JournalValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JournalValidationError';
  }
}

/**
 * Buy:  PNL = exit - entry
 * Sell: PNL = entry - exit
 * PNL % is relative to the entry price and is null for a zero entry.
 */
export const computePnl = (
  entryPrice: number | null,
  exitPrice: number | null,
  tradeType: TradeType,
): { pnl: number | null; pnlPct: number | null } => {
  if (tradeType !== 'Buy' && tradeType !== 'Sell') {
    return { pnl: null, pnlPct: null };
  }
  if (entryPrice === null || exitPrice === null || !Number.isFinite(entryPrice) || !Number.isFinite(exitPrice)) {
    return { pnl: null, pnlPct: null };
  }

  const pnl = tradeType === 'Buy' ? exitPrice - entryPrice : entryPrice - exitPrice;
  if (entryPrice === 0) {
    return { pnl, pnlPct: null };
  }
  return { pnl, pnlPct: (pnl / entryPrice) * 100 };
};

export const applyJournalUpdate = (record: SignalRecord, patch: JournalPatch): SignalRecord => {
  const updated: SignalRecord = { ...record };

  if (patch.notes !== undefined) {
    updated.notes = String(patch.notes);
  }

  if (patch.tradeType !== undefined) {
    updated.tradeType = patch.tradeType;
    // Opening a trade books it at the signal's close
    if (patch.tradeType !== '' && record.closePrice !== null) {
      updated.entryPrice = record.closePrice;
    }
  }

  if (patch.entryPrice !== undefined) {
    if (patch.entryPrice !== null && patch.entryPrice < 0) {
      throw new JournalValidationError('Entry Price must not be negative');
    }
    updated.entryPrice = patch.entryPrice;
  }
  if (patch.targetExitPrice !== undefined) {
    updated.targetExitPrice = patch.targetExitPrice;
  }
  if (patch.exitPrice !== undefined) {
    updated.exitPrice = patch.exitPrice;
  }

  return { ...updated, ...computePnl(updated.entryPrice, updated.exitPrice, updated.tradeType) };
};
