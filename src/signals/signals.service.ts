import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { SignalTableStore } from './signal-table.store';
import { SignalRecord, identityKey } from './signal-record';
import { buildTableSchema, TableView, toTableView } from './signal-table.schema';
import { applyJournalUpdate, JournalPatch, JournalValidationError } from './journal';
import { UpdateJournalDto } from './dto/update-journal.dto';
import { TIMEFRAME_NAMES } from '../config/timeframes.config';
import { LoggerService } from '../logger/logger.service';

export interface TimeframeSummary {
  timeframe: string;
  columns: string[];
}

@Injectable()
export class SignalsService {
  constructor(
    private store: SignalTableStore,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SignalsService');
  }

  listTimeframes(): TimeframeSummary[] {
    return TIMEFRAME_NAMES.map((timeframe) => ({
      timeframe,
      columns: buildTableSchema(timeframe, TIMEFRAME_NAMES).columns,
    }));
  }

  async getTable(timeframe: string): Promise<TableView> {
    this.assertTimeframe(timeframe);
    const records = await this.store.readTable(timeframe);
    return toTableView(records, buildTableSchema(timeframe, TIMEFRAME_NAMES));
  }

  /**
   * Edits the user-owned fields of one row and rewrites that timeframe's table.
   */
  async updateJournal(timeframe: string, dto: UpdateJournalDto): Promise<SignalRecord> {
    this.assertTimeframe(timeframe);

    const table = await this.store.readTable(timeframe);
    const key = identityKey(dto);
    const index = table.findIndex((record) => identityKey(record) === key);
    if (index === -1) {
      throw new NotFoundException(`No ${dto.signal} signal for ${dto.token} at ${dto.datetime} in ${timeframe}`);
    }

    const patch: JournalPatch = {
      notes: dto.notes,
      tradeType: dto.tradeType,
      entryPrice: dto.entryPrice,
      targetExitPrice: dto.targetExitPrice,
      exitPrice: dto.exitPrice,
    };

    let updated: SignalRecord;
    try {
      updated = applyJournalUpdate(table[index], patch);
    } catch (error: unknown) {
      if (error instanceof JournalValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const next = table.map((record, i) => (i === index ? updated : record));
    await this.store.writeTables(new Map([[timeframe, next]]));

    this.logger.log('Journal updated', {
      timeframe,
      token: dto.token,
      signal: dto.signal,
      datetime: dto.datetime,
      tradeType: updated.tradeType,
    });
    return updated;
  }

  private assertTimeframe(timeframe: string): void {
    if (!TIMEFRAME_NAMES.includes(timeframe)) {
      throw new NotFoundException(`Unknown timeframe: ${timeframe}`);
    }
  }
}
