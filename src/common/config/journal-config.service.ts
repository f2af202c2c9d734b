import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigValidationError } from '../errors/config-validation-error';
import type { JournalLimits } from '../types/risk.type';

export const JOURNAL_CONFIG_DEFAULTS: JournalLimits = {
  maxRiskPct: 2,
  minStopDistancePct: 0.05,
  maxStopDistancePct: 20,
  maxTradesPerDay: 5,
  cooldownMinutes: 60,
  cooldownLossStreak: 2,
  allowLive: false,
};

/**
 * Loads and validates the risk and behavior limits from the environment.
 * Validation runs once at module init; a bad value stops the application.
 */
@Injectable()
export class JournalConfigService implements OnModuleInit {
  private readonly logger = new Logger(JournalConfigService.name);
  private limits: JournalLimits | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    this.limits = this.validateConfig();
    this.logger.log({
      message: 'Journal configuration validated',
      data: this.limits,
    });
  }

  getLimits(): JournalLimits {
    if (!this.limits) {
      this.limits = this.validateConfig();
    }
    return this.limits;
  }

  private validateConfig(): JournalLimits {
    const errors: string[] = [];

    const maxRiskPct = this.readNumber(
      'JOURNAL_MAX_RISK_PCT',
      JOURNAL_CONFIG_DEFAULTS.maxRiskPct,
    );
    const minStopDistancePct = this.readNumber(
      'JOURNAL_MIN_STOP_DISTANCE_PCT',
      JOURNAL_CONFIG_DEFAULTS.minStopDistancePct,
    );
    const maxStopDistancePct = this.readNumber(
      'JOURNAL_MAX_STOP_DISTANCE_PCT',
      JOURNAL_CONFIG_DEFAULTS.maxStopDistancePct,
    );
    const maxTradesPerDay = this.readNumber(
      'JOURNAL_MAX_TRADES_PER_DAY',
      JOURNAL_CONFIG_DEFAULTS.maxTradesPerDay,
    );
    const cooldownMinutes = this.readNumber(
      'JOURNAL_COOLDOWN_MINUTES',
      JOURNAL_CONFIG_DEFAULTS.cooldownMinutes,
    );
    const cooldownLossStreak = this.readNumber(
      'JOURNAL_COOLDOWN_LOSS_STREAK',
      JOURNAL_CONFIG_DEFAULTS.cooldownLossStreak,
    );
    const allowLiveRaw = this.configService.get<string | boolean>(
      'JOURNAL_ALLOW_LIVE',
      JOURNAL_CONFIG_DEFAULTS.allowLive,
    );
    const allowLive = allowLiveRaw === true || allowLiveRaw === 'true';

    if (!(maxRiskPct > 0 && maxRiskPct <= 100)) {
      errors.push('JOURNAL_MAX_RISK_PCT must be in (0, 100]');
    }
    if (!(minStopDistancePct > 0)) {
      errors.push('JOURNAL_MIN_STOP_DISTANCE_PCT must be greater than 0');
    }
    if (
      !(maxStopDistancePct > minStopDistancePct && maxStopDistancePct <= 100)
    ) {
      errors.push(
        'JOURNAL_MAX_STOP_DISTANCE_PCT must be in (JOURNAL_MIN_STOP_DISTANCE_PCT, 100]',
      );
    }
    for (const [key, value] of [
      ['JOURNAL_MAX_TRADES_PER_DAY', maxTradesPerDay],
      ['JOURNAL_COOLDOWN_MINUTES', cooldownMinutes],
      ['JOURNAL_COOLDOWN_LOSS_STREAK', cooldownLossStreak],
    ] as const) {
      if (!Number.isInteger(value) || value <= 0) {
        errors.push(`${key} must be a positive integer`);
      }
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(
        `Invalid journal configuration: ${errors.join('; ')}`,
        errors,
      );
    }

    return {
      maxRiskPct,
      minStopDistancePct,
      maxStopDistancePct,
      maxTradesPerDay,
      cooldownMinutes,
      cooldownLossStreak,
      allowLive,
    };
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    return Number(raw);
  }
}
