import { IsIn, IsNotEmpty, IsNumber, IsOptional, IsString, Matches } from 'class-validator';
import { SIGNAL_STATES, SignalState, TradeType } from '../signal-record';

const TRADE_TYPES: readonly TradeType[] = ['Buy', 'Sell', ''];

export class UpdateJournalDto {
  // Identity of the row being edited
  @Matches(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/, { message: 'datetime must be YYYY-MM-DDTHH:mm:ss' })
  datetime!: string;

  @IsString()
  @IsNotEmpty()
  token!: string;

  @IsIn(SIGNAL_STATES)
  signal!: SignalState;

  @IsString()
  @IsOptional()
  notes?: string;

  @IsIn(TRADE_TYPES)
  @IsOptional()
  tradeType?: TradeType;

  // null clears the value
  @IsNumber()
  @IsOptional()
  entryPrice?: number | null;

  @IsNumber()
  @IsOptional()
  targetExitPrice?: number | null;

  @IsNumber()
  @IsOptional()
  exitPrice?: number | null;
}
