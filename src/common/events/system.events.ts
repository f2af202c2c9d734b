import { BaseEvent } from './base.event';

/**
 * Emitted when an unhandled critical error reaches the exception filter.
 */
export class SystemHealthCriticalEvent extends BaseEvent {
  constructor(
    public readonly component: string,
    public readonly reason: string,
    public readonly suggestedActions: string[],
    public readonly severity: 'critical' | 'warning',
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
