import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { EntityManager } from 'typeorm';
import { TradeRepository } from './trade.repository';
import { TradeEntity } from '../entities/trade.entity';

describe('TradeRepository', () => {
  let repo: TradeRepository;
  const queryBuilder = {
    where: vi.fn(),
    andWhere: vi.fn(),
    orderBy: vi.fn(),
    getMany: vi.fn(),
  };
  const mockTrades = {
    create: vi.fn(),
    save: vi.fn(),
    findOne: vi.fn(),
    update: vi.fn(),
    createQueryBuilder: vi.fn(),
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    queryBuilder.where.mockReturnValue(queryBuilder);
    queryBuilder.andWhere.mockReturnValue(queryBuilder);
    queryBuilder.orderBy.mockReturnValue(queryBuilder);
    mockTrades.createQueryBuilder.mockReturnValue(queryBuilder);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TradeRepository,
        { provide: getRepositoryToken(TradeEntity), useValue: mockTrades },
      ],
    }).compile();

    repo = module.get<TradeRepository>(TradeRepository);
  });

  it('should create and save a trade', async () => {
    const data = {
      userId: 'user-1',
      symbol: 'BTCUSDT',
      strategy: 'breakout',
      mode: 'PAPER' as const,
      status: 'OPEN' as const,
      openedAt: new Date('2026-01-05T10:00:00.000Z'),
      closedAt: null,
      entryPrice: 65000,
      exitPrice: null,
      qty: 0.01,
      riskPct: 1,
      stopDistancePct: 0.5,
      pnl: null,
      rr: null,
      ruleViolation: false,
      notes: null,
    };
    mockTrades.create.mockReturnValue(data);
    mockTrades.save.mockResolvedValue({ id: 'trade-1', ...data });

    const result = await repo.create(data);

    expect(mockTrades.create).toHaveBeenCalledWith(data);
    expect(mockTrades.save).toHaveBeenCalledWith(data);
    expect(result.id).toBe('trade-1');
  });

  it('should scope findOwned to the user', async () => {
    mockTrades.findOne.mockResolvedValue(null);

    const result = await repo.findOwned('trade-1', 'user-2');

    expect(mockTrades.findOne).toHaveBeenCalledWith({
      where: { id: 'trade-1', userId: 'user-2' },
    });
    expect(result).toBeNull();
  });

  it('should look up open trades by symbol and mode', async () => {
    mockTrades.findOne.mockResolvedValue({ id: 'trade-1' });

    await repo.findOpenBySymbol('user-1', 'ETHUSDT', 'LIVE');

    expect(mockTrades.findOne).toHaveBeenCalledWith({
      where: {
        userId: 'user-1',
        symbol: 'ETHUSDT',
        mode: 'LIVE',
        status: 'OPEN',
      },
    });
  });

  describe('closeIfOpen', () => {
    const fields = {
      closedAt: new Date('2026-01-05T12:00:00.000Z'),
      exitPrice: 66000,
      pnl: 10,
      rr: 2,
      ruleViolation: false,
      notes: 'target hit',
    };

    it('should only update rows that are still OPEN', async () => {
      mockTrades.update.mockResolvedValue({ affected: 1 });

      const closed = await repo.closeIfOpen('trade-1', 'user-1', fields);

      expect(mockTrades.update).toHaveBeenCalledWith(
        { id: 'trade-1', userId: 'user-1', status: 'OPEN' },
        { ...fields, status: 'CLOSED' },
      );
      expect(closed).toBe(true);
    });

    it('should report false when no row changed', async () => {
      mockTrades.update.mockResolvedValue({ affected: 0 });

      expect(await repo.closeIfOpen('trade-1', 'user-1', fields)).toBe(false);
    });

    it('should update through the transaction manager when given one', async () => {
      const txTrades = { update: vi.fn().mockResolvedValue({ affected: 1 }) };
      const manager = {
        getRepository: vi.fn().mockReturnValue(txTrades),
      } as unknown as EntityManager;

      const closed = await repo.closeIfOpen('trade-1', 'user-1', fields, manager);

      expect(manager.getRepository).toHaveBeenCalledWith(TradeEntity);
      expect(txTrades.update).toHaveBeenCalledWith(
        { id: 'trade-1', userId: 'user-1', status: 'OPEN' },
        { ...fields, status: 'CLOSED' },
      );
      expect(mockTrades.update).not.toHaveBeenCalled();
      expect(closed).toBe(true);
    });
  });

  it('should query trades opened since a date, newest first', async () => {
    queryBuilder.getMany.mockResolvedValue([{ id: 'trade-2' }]);

    const result = await repo.findOpenedSince(
      'user-1',
      new Date('2026-01-01T00:00:00.000Z'),
    );

    expect(queryBuilder.where).toHaveBeenCalledWith('trade.userId = :userId', {
      userId: 'user-1',
    });
    expect(queryBuilder.andWhere).toHaveBeenCalledWith(
      'trade.openedAt >= :since',
      { since: '2026-01-01 00:00:00.000' },
    );
    expect(queryBuilder.orderBy).toHaveBeenCalledWith('trade.openedAt', 'DESC');
    expect(result).toEqual([{ id: 'trade-2' }]);
  });
});
