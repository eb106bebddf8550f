import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { TypeOrmSignalTableStore } from './signal-table.store';
import { Signal } from '../entities/signal.entity';
import { EMPTY_JOURNAL, SignalRecord } from './signal-record';
import { LoggerService } from '../logger/logger.service';
import { StoreReadError, StoreWriteError } from '../common/errors';

const record = (i: number): SignalRecord => ({
  datetime: '2024-03-01T00:00:00',
  signal: 'Buy',
  token: `SYM${i}`,
  notes: '',
  closePrice: 10,
  cci: -110,
  stochK: 30,
  stochD: 20,
  slopeK: 1,
  slopeD: 1,
  plusDi: 25,
  minusDi: 10,
  adx: 22,
  trends: { weekly: 'up', '4h': '' },
  ...EMPTY_JOURNAL,
});

describe('TypeOrmSignalTableStore', () => {
  let store: TypeOrmSignalTableStore;

  const manager = {
    delete: jest.fn(),
    insert: jest.fn(),
  };
  const mockRepository = {
    find: jest.fn(),
    manager: {
      transaction: jest.fn(async (run: (em: typeof manager) => Promise<void>) => run(manager)),
    },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmSignalTableStore,
        { provide: getRepositoryToken(Signal), useValue: mockRepository },
        {
          provide: LoggerService,
          useValue: { setContext: jest.fn(), log: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() },
        },
      ],
    }).compile();

    store = module.get<TypeOrmSignalTableStore>(TypeOrmSignalTableStore);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('readTable', () => {
    it('reads rows in table order', async () => {
      const row = Object.assign(new Signal(), {
        ...record(1),
        id: 'row-1',
        timeframe: 'daily',
        rowIndex: 0,
        updatedAt: new Date('2024-03-01T00:00:00Z'),
      });
      mockRepository.find.mockResolvedValue([row]);

      await expect(store.readTable('daily')).resolves.toEqual([record(1)]);
      expect(mockRepository.find).toHaveBeenCalledWith({ where: { timeframe: 'daily' }, order: { rowIndex: 'ASC' } });
    });

    it('wraps database failures', async () => {
      mockRepository.find.mockRejectedValue(new Error('connection refused'));

      const result = store.readTable('daily');
      await expect(result).rejects.toBeInstanceOf(StoreReadError);
      await expect(result).rejects.toThrow('Failed to read persisted table "daily": connection refused');
    });
  });

  describe('writeTables', () => {
    it('replaces each table inside one transaction', async () => {
      const daily = Array.from({ length: 1200 }, (_, i) => record(i));
      const weekly = [record(0)];

      await store.writeTables(
        new Map([
          ['daily', daily],
          ['weekly', weekly],
        ]),
      );

      expect(mockRepository.manager.transaction).toHaveBeenCalledTimes(1);
      expect(manager.delete.mock.calls).toEqual([
        [Signal, { timeframe: 'daily' }],
        [Signal, { timeframe: 'weekly' }],
      ]);

      const batchSizes = manager.insert.mock.calls.map((call) => call[1].length);
      expect(batchSizes).toEqual([500, 500, 200, 1]);
      expect(manager.insert.mock.calls[2][1][0]).toMatchObject({ timeframe: 'daily', rowIndex: 1000, token: 'SYM1000' });
      expect(manager.insert.mock.calls[3][1][0]).toMatchObject({ timeframe: 'weekly', rowIndex: 0, token: 'SYM0' });
    });

    it('reports which tables failed to persist', async () => {
      mockRepository.manager.transaction.mockRejectedValueOnce(new Error('deadlock detected'));

      const result = store.writeTables(
        new Map([
          ['daily', [record(1)]],
          ['4h', []],
        ]),
      );
      await expect(result).rejects.toBeInstanceOf(StoreWriteError);
      await expect(result).rejects.toThrow('Failed to persist tables [daily, 4h]: deadlock detected');
    });
  });
});
