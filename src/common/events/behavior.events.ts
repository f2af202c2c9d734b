import { BaseEvent } from './base.event';

/**
 * Emitted when consecutive losses reach the configured streak and the user
 * is put into cooldown.
 */
export class CooldownStartedEvent extends BaseEvent {
  constructor(
    public readonly userId: string,
    public readonly consecutiveLosses: number,
    public readonly cooldownUntil: Date,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
