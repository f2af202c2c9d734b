import type { CheckTradeInput, CheckTradeResult } from '../types/risk.type';
import type {
  CloseTradeInput,
  OpenTradeInput,
  Trade,
} from '../types/trade.type';

export interface ITradeRiskEngine {
  /**
   * Size the intended risk and decide ALLOW / WARN / BLOCK.
   * @throws ValidationError on non-positive equity, risk outside (0, 100] or
   * a stop distance outside the configured bounds
   */
  checkTrade(input: CheckTradeInput): Promise<CheckTradeResult>;
  /**
   * Journal a new OPEN trade.
   * @throws ValidationError on out-of-bounds parameters or disabled LIVE mode
   * @throws DuplicateError when the user already holds an OPEN trade on the
   * same symbol in the same mode
   */
  openTrade(input: OpenTradeInput): Promise<Trade>;
  /**
   * Transition an OPEN trade owned by the caller to CLOSED.
   * @throws NotFoundError when no such OPEN trade exists
   */
  closeTrade(input: CloseTradeInput): Promise<Trade>;
  /** Trades opened in the last `days` days, newest first. */
  listTrades(userId: string, days: number): Promise<Trade[]>;
}
