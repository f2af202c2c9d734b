export interface DailyReport {
  day: string;
  trades: number;
  wins: number;
  losses: number;
  realizedPnl: number;
  consecutiveLosses: number;
  cooldownUntil: string | null;
}

export interface WeeklyReport {
  startDay: string;
  endDay: string;
  trades: number;
  wins: number;
  losses: number;
  realizedPnl: number;
  maxConsecutiveLosses: number;
}
