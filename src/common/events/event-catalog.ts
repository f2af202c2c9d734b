/**
 * Centralized catalog of all domain event names.
 * Use these constants when emitting or subscribing to events.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., TradeOpenedEvent)
 */
export const EVENT_NAMES = {
  /** Emitted after a trade is persisted in OPEN status */
  TRADE_OPENED: 'journal.trade.opened',

  /** Emitted after a trade transitions OPEN → CLOSED */
  TRADE_CLOSED: 'journal.trade.closed',

  /** Emitted when check-trade answers BLOCK */
  TRADE_CHECK_BLOCKED: 'journal.check.blocked',

  /** Emitted when a losing streak puts the user into cooldown */
  COOLDOWN_STARTED: 'journal.behavior.cooldown_started',

  /** Emitted by the error filter for unhandled critical SystemErrors */
  SYSTEM_HEALTH_CRITICAL: 'system.health.critical',
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
