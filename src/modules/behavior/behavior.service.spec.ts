import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { EntityManager } from 'typeorm';
import { BehaviorService } from './behavior.service';
import { JournalConfigService } from '../../common/config/journal-config.service';
import { EVENT_NAMES } from '../../common/events';
import { DailyStatEntity } from '../../persistence/entities/daily-stat.entity';
import { DailyStatRepository } from '../../persistence/repositories/daily-stat.repository';
import {
  createJournalConfig,
  createMockDailyStatRepository,
} from '../../test/mock-factories';

vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});

const buildStat = (overrides: Partial<DailyStatEntity> = {}) =>
  Object.assign(new DailyStatEntity(), {
    id: 'stat-1',
    userId: 'user-1',
    day: '2026-03-02',
    tradesCount: 0,
    wins: 0,
    losses: 0,
    realizedPnl: 0,
    consecutiveLosses: 0,
    cooldownUntil: null,
    ...overrides,
  });

describe('BehaviorService', () => {
  let service: BehaviorService;
  const mockStats = createMockDailyStatRepository();
  const mockEmitter = { emit: vi.fn() };

  beforeEach(async () => {
    vi.clearAllMocks();
    mockStats.findActiveCooldown.mockResolvedValue(null);
    mockStats.findByUserAndDay.mockResolvedValue(null);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BehaviorService,
        { provide: DailyStatRepository, useValue: mockStats },
        {
          provide: JournalConfigService,
          useValue: createJournalConfig({
            maxTradesPerDay: 5,
            cooldownLossStreak: 2,
            cooldownMinutes: 60,
          }),
        },
        { provide: EventEmitter2, useValue: mockEmitter },
      ],
    }).compile();

    service = module.get<BehaviorService>(BehaviorService);
  });

  describe('check', () => {
    it('should allow a user with no stats', async () => {
      const now = new Date('2026-03-03T10:00:00.000Z');

      const result = await service.check('user-1', now);

      expect(result).toEqual({
        allowed: true,
        reasons: [],
        suggestedActions: [],
        cooldownUntil: null,
      });
      expect(mockStats.findActiveCooldown).toHaveBeenCalledWith('user-1', now);
      expect(mockStats.findByUserAndDay).toHaveBeenCalledWith(
        'user-1',
        '2026-03-03',
      );
    });

    it("should block during a cooldown carried over from yesterday's row", async () => {
      const cooldownUntil = new Date('2026-03-03T00:30:00.000Z');
      mockStats.findActiveCooldown.mockResolvedValue(
        buildStat({ day: '2026-03-02', consecutiveLosses: 2, cooldownUntil }),
      );

      const result = await service.check(
        'user-1',
        new Date('2026-03-03T00:10:00.000Z'),
      );

      expect(result.allowed).toBe(false);
      expect(result.reasons).toEqual([
        'Cooldown active until 2026-03-03T00:30:00.000Z.',
      ]);
      expect(result.cooldownUntil).toEqual(cooldownUntil);
    });

    it('should block during a multi-day cooldown started two days earlier', async () => {
      const cooldownUntil = new Date('2026-03-04T12:00:00.000Z');
      mockStats.findActiveCooldown.mockResolvedValue(
        buildStat({ day: '2026-03-02', consecutiveLosses: 2, cooldownUntil }),
      );

      const result = await service.check(
        'user-1',
        new Date('2026-03-04T06:00:00.000Z'),
      );

      expect(result.allowed).toBe(false);
      expect(result.reasons).toEqual([
        'Cooldown active until 2026-03-04T12:00:00.000Z.',
      ]);
    });

    it('should ignore a cooldown that has already ended', async () => {
      mockStats.findActiveCooldown.mockResolvedValue(
        buildStat({
          day: '2026-03-03',
          cooldownUntil: new Date('2026-03-03T09:00:00.000Z'),
        }),
      );

      const result = await service.check(
        'user-1',
        new Date('2026-03-03T10:00:00.000Z'),
      );

      expect(result.allowed).toBe(true);
    });

    it('should block once the daily trade cap is reached', async () => {
      mockStats.findByUserAndDay.mockResolvedValue(
        buildStat({ day: '2026-03-03', tradesCount: 5 }),
      );

      const result = await service.check(
        'user-1',
        new Date('2026-03-03T10:00:00.000Z'),
      );

      expect(result.allowed).toBe(false);
      expect(result.reasons).toEqual(['Max trades per day reached (5/5).']);
    });
  });

  describe('recordTradeClose', () => {
    it('should book a win and reset the losing streak', async () => {
      mockStats.getOrInit.mockResolvedValue(
        buildStat({
          tradesCount: 1,
          losses: 1,
          realizedPnl: -5,
          consecutiveLosses: 1,
        }),
      );

      const { stat, cooldownStarted } = await service.recordTradeClose(
        'user-1',
        12.5,
        new Date('2026-03-02T15:00:00.000Z'),
      );

      expect(mockStats.getOrInit).toHaveBeenCalledWith(
        'user-1',
        '2026-03-02',
        undefined,
      );
      expect(stat).toMatchObject({
        tradesCount: 2,
        wins: 1,
        losses: 1,
        realizedPnl: 7.5,
        consecutiveLosses: 0,
        cooldownUntil: null,
      });
      expect(cooldownStarted).toBe(false);
      expect(mockEmitter.emit).not.toHaveBeenCalled();
    });

    it('should start a cooldown when the losing streak reaches the threshold', async () => {
      mockStats.getOrInit.mockResolvedValue(
        buildStat({ tradesCount: 1, losses: 1, consecutiveLosses: 1 }),
      );

      const { stat, cooldownStarted } = await service.recordTradeClose(
        'user-1',
        -10,
        new Date('2026-03-02T15:00:00.000Z'),
      );

      expect(cooldownStarted).toBe(true);
      expect(stat.consecutiveLosses).toBe(2);
      expect(stat.cooldownUntil).toEqual(new Date('2026-03-02T16:00:00.000Z'));
      expect(mockStats.save).toHaveBeenCalledWith(stat, undefined);
      expect(mockEmitter.emit).not.toHaveBeenCalled();
    });

    it('should read and write through the given transaction manager', async () => {
      const manager = {} as EntityManager;
      const existing = buildStat();
      mockStats.getOrInit.mockResolvedValue(existing);

      await service.recordTradeClose(
        'user-1',
        5,
        new Date('2026-03-02T15:00:00.000Z'),
        manager,
      );

      expect(mockStats.getOrInit).toHaveBeenCalledWith(
        'user-1',
        '2026-03-02',
        manager,
      );
      expect(mockStats.save).toHaveBeenCalledWith(existing, manager);
    });

    it('should count a break-even close as a loss', async () => {
      mockStats.getOrInit.mockResolvedValue(buildStat());

      const { stat } = await service.recordTradeClose(
        'user-1',
        0,
        new Date('2026-03-02T15:00:00.000Z'),
      );

      expect(stat.losses).toBe(1);
      expect(stat.consecutiveLosses).toBe(1);
    });

    it('should add P&L without floating point drift', async () => {
      mockStats.getOrInit.mockResolvedValue(buildStat({ realizedPnl: 0.1 }));

      const { stat } = await service.recordTradeClose(
        'user-1',
        0.2,
        new Date('2026-03-02T15:00:00.000Z'),
      );

      expect(stat.realizedPnl).toBe(0.3);
    });
  });

  describe('announceCooldown', () => {
    it('should emit cooldown_started with the streak and end time', () => {
      service.announceCooldown(
        'user-1',
        buildStat({
          consecutiveLosses: 2,
          cooldownUntil: new Date('2026-03-02T16:00:00.000Z'),
        }),
      );

      expect(mockEmitter.emit).toHaveBeenCalledWith(
        EVENT_NAMES.COOLDOWN_STARTED,
        expect.objectContaining({
          userId: 'user-1',
          consecutiveLosses: 2,
          cooldownUntil: new Date('2026-03-02T16:00:00.000Z'),
        }),
      );
    });

    it('should stay quiet for a row without a cooldown', () => {
      service.announceCooldown('user-1', buildStat());

      expect(mockEmitter.emit).not.toHaveBeenCalled();
    });
  });
});
