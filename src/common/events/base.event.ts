import { getCorrelationId } from '../services/correlation-context';

/**
 * Base class for all domain events.
 * Provides common fields: timestamp and correlationId.
 *
 * correlationId falls back to the async context of the request that
 * emitted the event when not passed explicitly.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date;
  public readonly correlationId: string | undefined;

  protected constructor(correlationId?: string) {
    this.timestamp = new Date();
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
