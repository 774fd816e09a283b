/**
 * NotificationBus: best-effort fan-out of pipeline events.
 *
 * publish() is synchronous and never waits on a subscriber. Each subscriber
 * owns a bounded queue; one that falls behind is dropped and sees the loss
 * as a gap in `seq` when it reconnects. Events for one job reach every
 * subscriber in publish order.
 */

import { v4 as uuid } from 'uuid';
import {
  EVENT_SCHEMA_VERSION,
  PipelineEvent,
  PipelineEventInput,
  PipelineEventType,
} from '../domain/events';
import { logger } from '../logger';

const log = logger.child({ module: 'notifications' });

export interface EventFilter {
  jobId?: string;
  types?: PipelineEventType[];
}

export interface SubscribeOptions extends EventFilter {
  /** Events buffered before the subscriber is dropped. */
  maxQueue?: number;
}

export interface NotificationBusOptions {
  /** Events kept for recent(). */
  historySize?: number;
  defaultMaxQueue?: number;
}

function matchesFilter(event: PipelineEvent, filter: EventFilter): boolean {
  if (filter.jobId && event.jobId !== filter.jobId) return false;
  if (filter.types?.length && !filter.types.includes(event.type)) return false;
  return true;
}

/**
 * A subscriber's view of the bus, consumed with `for await`.
 */
export class EventStream implements AsyncIterable<PipelineEvent> {
  /** True once the subscriber was dropped for falling behind. */
  dropped = false;
  private queue: PipelineEvent[] = [];
  private waiter: ((result: IteratorResult<PipelineEvent>) => void) | null = null;
  private closed = false;

  constructor(
    readonly id: string,
    private readonly filter: EventFilter,
    private readonly maxQueue: number,
    private readonly onClose: (stream: EventStream) => void,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events waiting to be consumed. */
  get buffered(): number {
    return this.queue.length;
  }

  matches(event: PipelineEvent): boolean {
    return matchesFilter(event, this.filter);
  }

  /** Hand an event to this subscriber. Returns false when it overflowed. */
  deliver(event: PipelineEvent): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: event });
      return true;
    }
    if (this.queue.length >= this.maxQueue) {
      this.dropped = true;
      this.close();
      return false;
    }
    this.queue.push(event);
    return true;
  }

  /** Stop delivery. Queued events are still yielded before iteration ends. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<PipelineEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ done: false, value: event });
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<PipelineEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.queue = [];
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

/** The notification bus. */
export class NotificationBus {
  private seq = 0;
  private jobSeqs = new Map<string, number>();
  private streams = new Set<EventStream>();
  private listeners = new Set<{ filter: EventFilter; callback: (event: PipelineEvent) => void }>();
  private history: PipelineEvent[] = [];
  private readonly historySize: number;
  private readonly defaultMaxQueue: number;

  constructor(options: NotificationBusOptions = {}) {
    this.historySize = options.historySize ?? 200;
    this.defaultMaxQueue = options.defaultMaxQueue ?? 256;
  }

  /** Sequence and deliver an event. Never throws and never blocks. */
  publish(input: PipelineEventInput): PipelineEvent {
    this.seq += 1;
    let jobSeq: number | undefined;
    if (input.jobId) {
      jobSeq = (this.jobSeqs.get(input.jobId) ?? 0) + 1;
      this.jobSeqs.set(input.jobId, jobSeq);
    }

    const event: PipelineEvent = {
      id: `evt_${uuid()}`,
      seq: this.seq,
      jobSeq,
      type: input.type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      jobId: input.jobId,
      payload: input.payload,
    };

    this.history.push(event);
    if (this.history.length > this.historySize) this.history.shift();

    for (const stream of [...this.streams]) {
      if (!stream.matches(event)) continue;
      if (!stream.deliver(event)) {
        log.warn('Subscriber dropped after queue overflow', { subscriberId: stream.id, seq: event.seq });
      }
    }

    for (const listener of this.listeners) {
      if (!matchesFilter(event, listener.filter)) continue;
      try {
        listener.callback(event);
      } catch (err) {
        log.warn('Event listener failed', {
          type: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Open a buffered stream of matching events. */
  subscribe(options: SubscribeOptions = {}): EventStream {
    const stream = new EventStream(
      `sub_${uuid()}`,
      { jobId: options.jobId, types: options.types },
      options.maxQueue ?? this.defaultMaxQueue,
      (closed) => {
        this.streams.delete(closed);
      },
    );
    this.streams.add(stream);
    return stream;
  }

  /** Synchronous callback for matching events. Returns an unsubscribe function. */
  onEvent(callback: (event: PipelineEvent) => void, filter: EventFilter = {}): () => void {
    const entry = { filter, callback };
    this.listeners.add(entry);
    return () => {
      this.listeners.delete(entry);
    };
  }

  /** The most recent events, oldest first. */
  recent(limit = 50, filter: EventFilter = {}): PipelineEvent[] {
    return this.history.filter((event) => matchesFilter(event, filter)).slice(-Math.max(0, limit));
  }

  get subscriberCount(): number {
    return this.streams.size;
  }

  get lastSeq(): number {
    return this.seq;
  }

  /** End every open stream. */
  close(): void {
    for (const stream of [...this.streams]) stream.close();
  }
}
