import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import Decimal from 'decimal.js';
import { BaseEvent } from '../../common/events/base.event';
import { EVENT_NAMES } from '../../common/events/event-catalog';

export type EventSeverity = 'critical' | 'warning' | 'info';

/** Severity mapping for every domain event; anything unlisted is info. */
const CRITICAL_EVENTS = new Set<string>([EVENT_NAMES.SYSTEM_HEALTH_CRITICAL]);

const WARNING_EVENTS = new Set<string>([
  EVENT_NAMES.TRADE_CHECK_BLOCKED,
  EVENT_NAMES.COOLDOWN_STARTED,
]);

export interface EventConsumerMetrics {
  totalEventsProcessed: number;
  eventCounts: Record<string, number>;
  severityCounts: Record<EventSeverity, number>;
  lastEventTimestamp: Date | null;
  errorsCount: number;
}

@Injectable()
export class EventConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EventConsumerService.name);
  private static readonly MAX_SERIALIZE_DEPTH = 10;

  private totalEventsProcessed = 0;
  private eventCounts: Record<string, number> = {};
  private severityCounts: Record<EventSeverity, number> = {
    critical: 0,
    warning: 0,
    info: 0,
  };
  private lastEventTimestamp: Date | null = null;
  private errorsCount = 0;

  private onAnyListener:
    | ((eventName: string | string[], event: unknown) => void)
    | null = null;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  onModuleInit(): void {
    this.onAnyListener = (
      eventName: string | string[],
      event: unknown,
    ): void => {
      const name =
        typeof eventName === 'string' ? eventName : eventName.join('.');
      this.handleEvent(name, event);
    };

    this.eventEmitter.onAny(this.onAnyListener);

    this.logger.log({
      message: 'EventConsumerService initialized — listening to all events',
      module: 'monitoring',
    });
  }

  onModuleDestroy(): void {
    if (this.onAnyListener) {
      this.eventEmitter.offAny(this.onAnyListener);
      this.onAnyListener = null;
    }
  }

  /** @internal Called by onAny listener. Public only for unit test access. */
  handleEvent(eventName: string, event: unknown): void {
    const correlationId =
      event instanceof BaseEvent ? event.correlationId : undefined;
    try {
      const severity = this.classifyEventSeverity(eventName);

      this.totalEventsProcessed++;
      this.eventCounts[eventName] = (this.eventCounts[eventName] ?? 0) + 1;
      this.severityCounts[severity]++;
      this.lastEventTimestamp = new Date();

      const logData = {
        eventName,
        severity,
        correlationId,
        module: 'monitoring',
        data: this.summarizeEvent(event),
      };

      switch (severity) {
        case 'critical':
          this.logger.error(logData);
          break;
        case 'warning':
          this.logger.warn(logData);
          break;
        default:
          this.logger.log(logData);
          break;
      }
    } catch (error) {
      this.errorsCount++;
      this.logger.error({
        message: 'Event consumer handler error',
        eventName,
        correlationId,
        error: String(error),
        module: 'monitoring',
      });
      // never re-throw into the emitter
    }
  }

  classifyEventSeverity(eventName: string): EventSeverity {
    if (CRITICAL_EVENTS.has(eventName)) return 'critical';
    if (WARNING_EVENTS.has(eventName)) return 'warning';
    return 'info';
  }

  getMetrics(): EventConsumerMetrics {
    return {
      totalEventsProcessed: this.totalEventsProcessed,
      eventCounts: { ...this.eventCounts },
      severityCounts: { ...this.severityCounts },
      lastEventTimestamp: this.lastEventTimestamp,
      errorsCount: this.errorsCount,
    };
  }

  private summarizeEvent(event: unknown): Record<string, unknown> | string {
    if (!event || typeof event !== 'object') return 'unknown';
    const summary: Record<string, unknown> = {};
    const seen = new WeakSet<object>();
    for (const [key, value] of Object.entries(event)) {
      if (key === 'correlationId') continue;
      summary[key] = this.serializeValue(value, seen, 0);
    }
    return summary;
  }

  private serializeValue(
    value: unknown,
    seen: WeakSet<object>,
    depth: number,
  ): unknown {
    if (value === null || value === undefined) return value;
    if (typeof value !== 'object') return value;
    if (depth > EventConsumerService.MAX_SERIALIZE_DEPTH) return '[MaxDepth]';
    if (seen.has(value)) return '[Circular]';
    seen.add(value);
    if (value instanceof Date) return value.toISOString();
    if (Decimal.isDecimal(value)) return value.toString();
    if (Array.isArray(value))
      return value.map((v: unknown) => this.serializeValue(v, seen, depth + 1));
    const serialized: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      serialized[k] = this.serializeValue(v, seen, depth + 1);
    }
    return serialized;
  }
}
