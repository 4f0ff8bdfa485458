import { nanoid } from 'nanoid';
import type { EventInput, EventSink, EventType, ExecutionEvent } from '../types/events.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Configuration for the in-memory event log.
 */
export interface EventLogConfig {
  /** Maximum events to keep in memory (0 = unbounded) */
  maxEvents: number;

  /** Whether to also log each event through pino */
  logEvents: boolean;
}

export interface EventQueryOptions {
  aggregateId?: string;
  types?: readonly EventType[];
  /** Only events with sequence >= this value */
  fromSequence?: number;
  /** Keep the last N matches */
  limit?: number;
}

const DEFAULT_CONFIG: EventLogConfig = {
  maxEvents: 0,
  logEvents: false,
};

/**
 * In-memory append-only event log.
 *
 * Assigns each appended event a monotonically increasing sequence and keeps
 * a per-aggregate index for timeline queries.
 */
export class InMemoryEventLog implements EventSink {
  private readonly logger: Logger;
  private readonly config: EventLogConfig;
  private readonly events: ExecutionEvent[] = [];
  private readonly eventsByAggregate = new Map<string, ExecutionEvent[]>();
  private sequence = 0;

  constructor(config: Partial<EventLogConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = createLogger('event-log');
  }

  append(aggregateId: string, input: EventInput): ExecutionEvent {
    this.sequence += 1;
    const event: ExecutionEvent = {
      ...input,
      id: nanoid(),
      sequence: this.sequence,
      aggregateId,
      timestamp: new Date().toISOString(),
    };

    this.events.push(event);

    let aggregateEvents = this.eventsByAggregate.get(aggregateId);
    if (!aggregateEvents) {
      aggregateEvents = [];
      this.eventsByAggregate.set(aggregateId, aggregateEvents);
    }
    aggregateEvents.push(event);

    if (this.config.maxEvents > 0 && this.events.length > this.config.maxEvents) {
      const removed = this.events.shift();
      if (removed) {
        const indexed = this.eventsByAggregate.get(removed.aggregateId);
        if (indexed) {
          const idx = indexed.findIndex((e) => e.id === removed.id);
          if (idx !== -1) indexed.splice(idx, 1);
        }
      }
    }

    if (this.config.logEvents) {
      this.logger.info(
        { aggregateId, sequence: event.sequence, type: event.type, payload: event.payload },
        `Event: ${event.type}`
      );
    }

    return event;
  }

  query(options: EventQueryOptions = {}): ExecutionEvent[] {
    let results: ExecutionEvent[] = options.aggregateId
      ? [...(this.eventsByAggregate.get(options.aggregateId) ?? [])]
      : [...this.events];

    if (options.types && options.types.length > 0) {
      const types = options.types;
      results = results.filter((e) => types.includes(e.type));
    }

    if (options.fromSequence !== undefined) {
      const from = options.fromSequence;
      results = results.filter((e) => e.sequence >= from);
    }

    if (options.limit && options.limit > 0) {
      results = results.slice(-options.limit);
    }

    return results;
  }

  getAll(): ExecutionEvent[] {
    return [...this.events];
  }

  getLastSequence(): number {
    return this.sequence;
  }

  size(): number {
    return this.events.length;
  }

  /**
   * Drop all events. The sequence keeps counting so it stays monotonic.
   */
  clear(): void {
    this.events.length = 0;
    this.eventsByAggregate.clear();
  }
}

export function createEventLog(config?: Partial<EventLogConfig>): InMemoryEventLog {
  return new InMemoryEventLog(config);
}
