import { Injectable } from '@nestjs/common';
import type { TradingSession } from '../../common/types/risk.type';

const WEEKEND: TradingSession = {
  name: 'WEEKEND',
  liquidity: 'very low',
  riskMultiplier: 0.5,
  note: 'Thin weekend liquidity; trade only exceptional setups.',
};

/** Weekday sessions keyed by the first UTC hour past their close; later hours are OFF_HOURS. */
const WEEKDAY_SESSIONS: ReadonlyArray<{ until: number; session: TradingSession }> = [
  {
    until: 7,
    session: {
      name: 'ASIA',
      liquidity: 'low',
      riskMultiplier: 0.7,
      note: 'Lower volatility, prone to fake moves.',
    },
  },
  {
    until: 13,
    session: {
      name: 'EU',
      liquidity: 'medium',
      riskMultiplier: 0.9,
      note: 'Trend formation and structure building.',
    },
  },
  {
    until: 21,
    session: {
      name: 'US',
      liquidity: 'high',
      riskMultiplier: 1.0,
      note: 'Highest liquidity and strongest moves.',
    },
  },
];

const OFF_HOURS: TradingSession = {
  name: 'OFF_HOURS',
  liquidity: 'low',
  riskMultiplier: 0.5,
  note: 'Between the US close and the Asia open; spreads widen.',
};

/** Classifies a UTC instant into a trading session. */
@Injectable()
export class SessionService {
  detect(now: Date = new Date()): TradingSession {
    const weekday = now.getUTCDay();
    if (weekday === 0 || weekday === 6) {
      return { ...WEEKEND };
    }

    const hour = now.getUTCHours();
    const match = WEEKDAY_SESSIONS.find(({ until }) => hour < until);
    return { ...(match?.session ?? OFF_HOURS) };
  }
}
