import { Body, Controller, Get, Param, Patch } from '@nestjs/common';
import { SignalsService } from './signals.service';
import { UpdateJournalDto } from './dto/update-journal.dto';

@Controller('api/signals')
export class SignalsController {
  constructor(private signalsService: SignalsService) {}

  @Get()
  listTimeframes() {
    return this.signalsService.listTimeframes();
  }

  @Get(':timeframe')
  getTable(@Param('timeframe') timeframe: string) {
    return this.signalsService.getTable(timeframe);
  }

  @Patch(':timeframe/journal')
  updateJournal(@Param('timeframe') timeframe: string, @Body() dto: UpdateJournalDto) {
    return this.signalsService.updateJournal(timeframe, dto);
  }
}
