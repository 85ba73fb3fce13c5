import type { Topic } from '@relaydesk/shared';
import { QUEUE_CONFIG } from '../../config/constants.js';
import { errorMessage } from '../../errors.js';
import { createLogger } from '../../utils/logger.js';
import type { EventTransport, RawEventHandler } from '../transport.js';

const log = createLogger('transport:memory');

export interface PublishedEvent {
  topic: Topic;
  eventId: string;
  payload: unknown;
}

export interface MemoryTransportOptions {
  maxAttempts?: number;
  /** Keep a log of every published event; off outside tests */
  recordPublished?: boolean;
}

/**
 * In-process transport used when Redis is not configured. Handlers run
 * asynchronously after publish resolves and are retried on failure.
 */
export class MemoryEventTransport implements EventTransport {
  readonly name = 'memory';
  readonly published: PublishedEvent[] = [];

  private handlers = new Map<Topic, RawEventHandler[]>();
  private inFlight = new Set<Promise<void>>();

  private readonly maxAttempts: number;
  private readonly recordPublished: boolean;

  constructor(options: MemoryTransportOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? QUEUE_CONFIG.MAX_RETRIES;
    this.recordPublished = options.recordPublished ?? false;
  }

  async publish(topic: Topic, eventId: string, payload: object): Promise<void> {
    // Round-trip through JSON so consumers see what a real queue would hand them
    const wire: unknown = JSON.parse(JSON.stringify(payload));
    if (this.recordPublished) {
      this.published.push({ topic, eventId, payload: wire });
    }

    for (const handler of this.handlers.get(topic) ?? []) {
      this.track(this.deliver(topic, eventId, handler, wire));
    }
  }

  subscribe(topic: Topic, handler: RawEventHandler): void {
    const existing = this.handlers.get(topic) ?? [];
    this.handlers.set(topic, [...existing, handler]);
  }

  /**
   * Wait until every delivery, including ones scheduled by handlers, settles
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async close(): Promise<void> {
    await this.drain();
    this.handlers.clear();
  }

  private track(delivery: Promise<void>): void {
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  private async deliver(
    topic: Topic,
    eventId: string,
    handler: RawEventHandler,
    payload: unknown
  ): Promise<void> {
    await Promise.resolve();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await handler(payload);
        return;
      } catch (error) {
        log.warn(
          { topic, eventId, attempt, err: errorMessage(error) },
          'Event handler failed'
        );
      }
    }

    log.error({ topic, eventId, attempts: this.maxAttempts }, 'Event delivery exhausted retries');
  }
}
