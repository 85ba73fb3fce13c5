import type { EventByTopic, Topic } from '@relaydesk/shared';
import { PublishError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { EventTransport } from './transport.js';

const log = createLogger('publisher');

/**
 * Publishes domain events. Resolves once the transport accepted the event;
 * any failure, including a timeout, rejects with PublishError so the
 * calling pipeline step can retry. Callers commit state before publishing.
 */
export class EventPublisher {
  constructor(
    private readonly transport: EventTransport,
    private readonly timeoutMs: number
  ) {}

  async publish<T extends Topic>(topic: T, event: EventByTopic[T]): Promise<void> {
    try {
      await withTimeout(
        this.transport.publish(topic, event.eventId, event),
        this.timeoutMs,
        `publish to ${topic}`
      );
    } catch (error) {
      log.error({ topic, eventId: event.eventId, err: error }, 'Publish failed');
      throw new PublishError(topic, error);
    }

    log.debug({ topic, eventId: event.eventId, transport: this.transport.name }, 'Event published');
  }
}
