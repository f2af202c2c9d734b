import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level AsyncLocalStorage for correlation IDs.
 * This is NOT a NestJS service - it's a standalone module with singleton storage.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs an async function inside a correlation context.
 * Nested calls join the enclosing context instead of starting a new one, so a
 * close-trade request and the daily-stat update it triggers share one ID.
 *
 * @example
 * await withCorrelationId(async () => {
 *   this.logger.log({ message: 'Closing trade' });
 *   await this.behaviorService.recordTradeClose(userId, pnl, closedAt);
 * });
 */
export function withCorrelationId<T>(
  fn: () => Promise<T>,
  correlationId: string = getCorrelationId() ?? uuidv4(),
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/**
 * Gets the current correlation ID from the async context, or undefined
 * outside of withCorrelationId.
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
