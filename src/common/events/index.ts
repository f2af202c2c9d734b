export { BaseEvent } from './base.event';
export { EVENT_NAMES } from './event-catalog';
export type { EventName } from './event-catalog';
export {
  TradeOpenedEvent,
  TradeClosedEvent,
  TradeCheckBlockedEvent,
} from './trade.events';
export { CooldownStartedEvent } from './behavior.events';
export { SystemHealthCriticalEvent } from './system.events';
