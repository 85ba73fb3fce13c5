import type { EventByTopic, Topic } from '@relaydesk/shared';
import type { ZodError } from 'zod';
import { ValidationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { EventDeduplicator } from './dedup.js';
import { EVENT_SCHEMAS } from './schemas.js';
import type { EventTransport } from './transport.js';

const log = createLogger('consumer');

export type EventHandler<T extends Topic> = (event: EventByTopic[T]) => Promise<void>;

export function invalidEventError(topic: Topic, error: ZodError): ValidationError {
  return new ValidationError(
    `invalid ${topic} event`,
    { topic, issues: error.issues.map((issue) => issue.path.join('.')) },
    'INVALID_EVENT'
  );
}

/**
 * Subscribes typed handlers: validates each envelope, drops events already
 * handled (by event id) and rethrows handler errors so the transport
 * redelivers.
 */
export class EventConsumer {
  constructor(
    private readonly transport: EventTransport,
    private readonly dedup: EventDeduplicator
  ) {}

  on<T extends Topic>(topic: T, handler: EventHandler<T>): void {
    const schema = EVENT_SCHEMAS[topic];

    this.transport.subscribe(topic, async (payload) => {
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        // Redelivery cannot fix a malformed envelope
        const error = invalidEventError(topic, parsed.error);
        log.error({ code: error.errorCode.code, ...error.details }, 'Dropping invalid event');
        return;
      }

      const event = parsed.data;
      if (!this.dedup.begin(topic, event.eventId)) {
        log.debug({ topic, eventId: event.eventId }, 'Duplicate event skipped');
        return;
      }

      try {
        await handler(event);
        this.dedup.complete(topic, event.eventId);
      } catch (error) {
        this.dedup.release(topic, event.eventId);
        throw error;
      }
    });
  }
}
