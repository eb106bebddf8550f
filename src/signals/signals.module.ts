import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Signal } from '../entities/signal.entity';
import { SignalsService } from './signals.service';
import { SignalsController } from './signals.controller';
import { SignalTableStore, TypeOrmSignalTableStore } from './signal-table.store';

@Module({
  imports: [TypeOrmModule.forFeature([Signal])],
  controllers: [SignalsController],
  providers: [SignalsService, { provide: SignalTableStore, useClass: TypeOrmSignalTableStore }],
  exports: [SignalsService, SignalTableStore],
})
export class SignalsModule {}
