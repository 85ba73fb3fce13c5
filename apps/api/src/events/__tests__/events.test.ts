import { describe, it, expect, vi } from 'vitest';
import { TOPICS, type MessageCreatedEvent } from '@relaydesk/shared';
import { PublishError } from '../../errors.js';
import { StubTransport, ORG_ID } from '../../__tests__/helpers/fixtures.js';
import { EventConsumer, invalidEventError } from '../consumer.js';
import { EventDeduplicator } from '../dedup.js';
import { EventPublisher } from '../publisher.js';
import { EVENT_SCHEMAS } from '../schemas.js';
import { MemoryEventTransport } from '../transports/memory.js';

function messageCreated(eventId: string): MessageCreatedEvent {
  return {
    eventId,
    organizationId: ORG_ID,
    createdAt: '2024-05-01T10:00:00.000Z',
    messageId: 'msg-1',
    conversationId: 'conv-1',
    contactId: 'contact-1',
    platform: 'whatsapp',
    mediumId: 1,
    direction: 'inbound',
    senderType: 'customer',
    messageType: 'text',
    content: 'hello',
  };
}

describe('EventPublisher', () => {
  it('hands the event to the transport under its event id', async () => {
    const transport = new StubTransport();
    const publisher = new EventPublisher(transport, 1000);
    const event = messageCreated('msg_1');

    await publisher.publish(TOPICS.MESSAGE_CREATED, event);

    expect(transport.publish).toHaveBeenCalledWith('message-created', 'msg_1', event);
  });

  it('surfaces transport failures as PublishError', async () => {
    const transport = new StubTransport();
    transport.publish.mockRejectedValue(new Error('connection refused'));
    const publisher = new EventPublisher(transport, 1000);

    const result = publisher.publish(TOPICS.MESSAGE_CREATED, messageCreated('msg_2'));

    await expect(result).rejects.toBeInstanceOf(PublishError);
    await expect(result).rejects.toMatchObject({
      message: 'failed to publish to message-created: connection refused',
      errorCode: { name: 'PUBLISH_FAILED', retryable: true },
    });
  });

  it('gives up on a transport that never acknowledges', async () => {
    const transport = new StubTransport();
    transport.publish.mockImplementation(() => new Promise<void>(() => undefined));
    const publisher = new EventPublisher(transport, 10);

    await expect(publisher.publish(TOPICS.MESSAGE_CREATED, messageCreated('msg_3'))).rejects.toMatchObject({
      message: 'failed to publish to message-created: publish to message-created timed out after 10ms',
    });
  });
});

describe('EventDeduplicator', () => {
  it('rejects an event id once it completed', () => {
    const dedup = new EventDeduplicator();

    expect(dedup.begin('message-created', 'a')).toBe(true);
    dedup.complete('message-created', 'a');

    expect(dedup.begin('message-created', 'a')).toBe(false);
    expect(dedup.begin('message-delivery', 'a')).toBe(true);
    expect(dedup.getStats()).toEqual({ size: 1, duplicates: 1, totalChecks: 3 });
  });

  it('rejects concurrent copies but allows a retry after release', () => {
    const dedup = new EventDeduplicator();

    expect(dedup.begin('webhook-received', 'b')).toBe(true);
    expect(dedup.begin('webhook-received', 'b')).toBe(false);

    dedup.release('webhook-received', 'b');
    expect(dedup.begin('webhook-received', 'b')).toBe(true);
  });
});

describe('EventConsumer over the memory transport', () => {
  it('delivers each event id once', async () => {
    const transport = new MemoryEventTransport();
    const consumer = new EventConsumer(transport, new EventDeduplicator());
    const publisher = new EventPublisher(transport, 1000);
    const handler = vi.fn(async (_event: MessageCreatedEvent) => undefined);

    consumer.on(TOPICS.MESSAGE_CREATED, handler);
    await publisher.publish(TOPICS.MESSAGE_CREATED, messageCreated('msg_dup'));
    await publisher.publish(TOPICS.MESSAGE_CREATED, messageCreated('msg_dup'));
    await publisher.publish(TOPICS.MESSAGE_CREATED, messageCreated('msg_other'));
    await transport.drain();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map(([event]) => event.eventId)).toEqual(['msg_dup', 'msg_other']);
  });

  it('redelivers after a handler failure', async () => {
    const transport = new MemoryEventTransport({ maxAttempts: 3 });
    const consumer = new EventConsumer(transport, new EventDeduplicator());
    const handler = vi.fn(async (_event: MessageCreatedEvent) => undefined);
    handler.mockRejectedValueOnce(new Error('database unavailable'));

    consumer.on(TOPICS.MESSAGE_CREATED, handler);
    await transport.publish(TOPICS.MESSAGE_CREATED, 'msg_retry', messageCreated('msg_retry'));
    await transport.drain();

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('drops envelopes that fail validation', async () => {
    const transport = new MemoryEventTransport();
    const consumer = new EventConsumer(transport, new EventDeduplicator());
    const handler = vi.fn(async (_event: MessageCreatedEvent) => undefined);

    consumer.on(TOPICS.MESSAGE_CREATED, handler);
    await transport.publish(TOPICS.MESSAGE_CREATED, 'bad', { eventId: 'bad', content: 42 });
    await transport.drain();

    expect(handler).not.toHaveBeenCalled();
  });

  it('describes a malformed envelope as an invalid event', () => {
    const parsed = EVENT_SCHEMAS[TOPICS.MESSAGE_CREATED].safeParse({ ...messageCreated('msg_bad'), content: 42 });
    if (parsed.success) throw new Error('expected the envelope to be rejected');

    const error = invalidEventError(TOPICS.MESSAGE_CREATED, parsed.error);

    expect(error).toMatchObject({
      name: 'ValidationError',
      message: 'invalid message-created event',
      errorCode: { name: 'INVALID_EVENT', code: 40006, retryable: false },
      details: { topic: 'message-created', issues: ['content'] },
    });
  });

  it('hands consumers a JSON copy of the payload', async () => {
    const transport = new MemoryEventTransport({ recordPublished: true });
    const payload = { eventId: 'x', when: new Date('2024-05-01T10:00:00.000Z') };

    await transport.publish(TOPICS.MESSAGE_DELIVERY, 'x', payload);

    expect(transport.published[0]?.payload).toEqual({ eventId: 'x', when: '2024-05-01T10:00:00.000Z' });
  });

  it('keeps no log of published events unless asked to', async () => {
    const transport = new MemoryEventTransport();
    const handler = vi.fn(async (_payload: unknown) => undefined);
    transport.subscribe(TOPICS.MESSAGE_DELIVERY, handler);

    await transport.publish(TOPICS.MESSAGE_DELIVERY, 'x', { eventId: 'x' });
    await transport.drain();

    expect(handler).toHaveBeenCalledWith({ eventId: 'x' });
    expect(transport.published).toHaveLength(0);
  });
});
