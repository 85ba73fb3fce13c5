import { describe, it, expect, beforeEach } from 'vitest';
import { randomUUID } from 'crypto';
import type { Conversation } from '../../../db/schema.js';
import {
  InMemoryConversationRepository,
  InMemoryMessageRepository,
} from '../../../__tests__/helpers/memory-repositories.js';
import { ORG_ID, OTHER_ORG_ID } from '../../../__tests__/helpers/fixtures.js';
import { MessageService, type CreateMessageInput } from '../service.js';

describe('MessageService', () => {
  let conversations: InMemoryConversationRepository;
  let messages: InMemoryMessageRepository;
  let service: MessageService;
  let conversation: Conversation;

  beforeEach(() => {
    conversations = new InMemoryConversationRepository();
    messages = new InMemoryMessageRepository();
    service = new MessageService(messages, conversations);
    conversation = conversations.seed({
      organizationId: ORG_ID,
      userId: randomUUID(),
      contactId: randomUUID(),
      mediumId: 1,
    });
  });

  function inbound(overrides: Partial<CreateMessageInput> = {}): CreateMessageInput {
    return {
      conversationId: conversation.id,
      organizationId: ORG_ID,
      direction: 'inbound',
      senderType: 'customer',
      senderId: conversation.contactId,
      messageType: 'text',
      content: 'hello',
      ...overrides,
    };
  }

  describe('createMessage()', () => {
    it('stores the message with defaults', async () => {
      const message = await service.createMessage(inbound());

      expect(message).toMatchObject({
        conversationId: conversation.id,
        senderName: 'Customer',
        status: 0,
        aiGenerated: false,
        mediaUrl: null,
        deliveredAt: null,
      });
    });

    it('stamps delivered_at when created as delivered', async () => {
      const message = await service.createMessage(inbound({ status: 'delivered' }));

      expect(message.status).toBe(2);
      expect(message.deliveredAt).toBeInstanceOf(Date);
    });

    it('updates the human last-message fields for customer messages', async () => {
      const at = new Date('2024-05-01T10:00:00.000Z');
      const message = await service.createMessage(inbound({ content: 'where is my order?', createdAt: at }));

      expect(conversations.rows.get(conversation.id)).toMatchObject({
        lastMessageAt: at,
        lastHumanMessageAt: at,
        lastAiMessageAt: null,
        lastMessageById: conversation.contactId,
        lastMessageByType: 'customer',
        lastMessageByName: 'Customer',
        lastMessageContent: 'where is my order?',
        lastMessageType: 'text',
      });
      expect(message.createdAt).toEqual(at);
    });

    it('updates the AI last-message fields for AI replies', async () => {
      const at = new Date('2024-05-01T10:05:00.000Z');
      await service.createMessage(inbound({
        direction: 'outbound',
        senderType: 'ai',
        senderId: null,
        content: 'It shipped yesterday.',
        createdAt: at,
      }));

      expect(conversations.rows.get(conversation.id)).toMatchObject({
        lastMessageAt: at,
        lastAiMessageAt: at,
        lastHumanMessageAt: null,
        lastMessageByType: 'ai',
        lastMessageByName: 'AI Assistant',
      });
    });

    it('does not let an older message overwrite a newer preview', async () => {
      await service.createMessage(inbound({ content: 'second', createdAt: new Date('2024-05-01T10:01:00Z') }));
      await service.createMessage(inbound({ content: 'first', createdAt: new Date('2024-05-01T10:00:00Z') }));

      expect(conversations.rows.get(conversation.id)?.lastMessageContent).toBe('second');
    });

    it('truncates the preview', async () => {
      await service.createMessage(inbound({ content: 'x'.repeat(300) }));

      const preview = conversations.rows.get(conversation.id)?.lastMessageContent;
      expect(preview).toHaveLength(255);
      expect(preview?.endsWith('...')).toBe(true);
    });

    it('returns the original message for a repeated idempotency key', async () => {
      const first = await service.createMessage(inbound({ idempotencyKey: 'whatsapp:wamid.A1' }));
      const second = await service.createMessage(inbound({
        idempotencyKey: 'whatsapp:wamid.A1',
        createdAt: new Date(Date.now() + 60_000),
      }));

      expect(second.id).toBe(first.id);
      expect(messages.rows.size).toBe(1);
      expect(conversations.rows.get(conversation.id)?.lastMessageAt).toEqual(first.createdAt);
    });

    it('rejects unknown, deleted and foreign conversations', async () => {
      await expect(service.createMessage(inbound({ conversationId: randomUUID() }))).rejects.toMatchObject({
        errorCode: { name: 'CONVERSATION_NOT_FOUND' },
      });
      await expect(service.createMessage(inbound({ organizationId: OTHER_ORG_ID }))).rejects.toMatchObject({
        errorCode: { name: 'CONVERSATION_NOT_FOUND' },
      });
    });

    it('requires content for text and a URL for media', async () => {
      await expect(service.createMessage(inbound({ content: '   ' }))).rejects.toMatchObject({
        message: 'text message requires content',
        errorCode: { name: 'INVALID_MESSAGE' },
      });
      await expect(service.createMessage(inbound({ messageType: 'image', content: '' }))).rejects.toMatchObject({
        message: 'image message requires a media URL',
      });

      const image = await service.createMessage(inbound({
        messageType: 'image',
        content: '',
        mediaUrl: 'https://cdn.example.test/a.jpg',
      }));
      expect(image.mediaUrl).toBe('https://cdn.example.test/a.jpg');
    });
  });

  describe('updateStatus()', () => {
    it('moves forward and stamps the matching timestamp', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));

      const sent = await service.updateStatus(message.id, 'sent');
      const delivered = await service.updateStatus(message.id, 'delivered');
      const read = await service.updateStatus(message.id, 'read');

      expect(sent.outcome).toBe('updated');
      expect(sent.message.status).toBe(1);
      expect(delivered.message.deliveredAt).toBeInstanceOf(Date);
      expect(read.message).toMatchObject({ status: 3, deliveredAt: null, failedAt: null });
      expect(read.message.readAt).toBeInstanceOf(Date);
    });

    it('is idempotent for a repeated status', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));

      const first = await service.updateStatus(message.id, 'delivered');
      const second = await service.updateStatus(message.id, 'delivered');

      expect(first.outcome).toBe('updated');
      expect(second.outcome).toBe('unchanged');
      expect(second.message.deliveredAt).toEqual(first.message.deliveredAt);
      expect(second.message.status).toBe(2);
    });

    it('records failures with a reason', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));
      await service.updateStatus(message.id, 'delivered');

      const failed = await service.updateStatus(message.id, 'failed', 'recipient blocked');

      expect(failed.outcome).toBe('updated');
      expect(failed.message).toMatchObject({
        status: 4,
        failureReason: 'recipient blocked',
        deliveredAt: null,
        readAt: null,
      });
      expect(failed.message.failedAt).toBeInstanceOf(Date);
    });

    it('uses a default failure reason', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));

      const failed = await service.updateStatus(message.id, 'failed');

      expect(failed.message.failureReason).toBe('Message delivery failed');
    });

    it('ignores backward transitions and transitions out of terminal statuses', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));
      await service.updateStatus(message.id, 'read');

      const backward = await service.updateStatus(message.id, 'delivered');
      const afterRead = await service.updateStatus(message.id, 'failed');

      expect(backward.outcome).toBe('ignored');
      expect(afterRead.outcome).toBe('ignored');
      expect(afterRead.message.status).toBe(3);
    });

    it('resolves a race between two callbacks to one update', async () => {
      const message = await service.createMessage(inbound({ direction: 'outbound', senderType: 'agent' }));

      const outcomes = await Promise.all([
        service.updateStatus(message.id, 'delivered'),
        service.updateStatus(message.id, 'delivered'),
      ]);

      expect(outcomes.map((o) => o.outcome).sort()).toEqual(['unchanged', 'updated']);
    });

    it('rejects unknown messages', async () => {
      await expect(service.updateStatus(randomUUID(), 'read')).rejects.toMatchObject({
        name: 'NotFoundError',
        errorCode: { name: 'MESSAGE_NOT_FOUND' },
      });
    });
  });

  describe('listMessages()', () => {
    it('pages newest first', async () => {
      const a = await service.createMessage(inbound({ content: 'a', createdAt: new Date('2024-05-01T10:00:00Z') }));
      const b = await service.createMessage(inbound({ content: 'b', createdAt: new Date('2024-05-01T10:01:00Z') }));
      const c = await service.createMessage(inbound({ content: 'c', createdAt: new Date('2024-05-01T10:02:00Z') }));

      expect((await service.listMessages(conversation.id, { limit: 2 })).map((m) => m.id)).toEqual([c.id, b.id]);
      expect((await service.listMessages(conversation.id, { before: b.createdAt })).map((m) => m.id)).toEqual([a.id]);
    });
  });

  describe('deleteMessage()', () => {
    it('removes the message', async () => {
      const message = await service.createMessage(inbound());

      await service.deleteMessage(message.id);

      await expect(service.getMessage(message.id)).rejects.toMatchObject({
        errorCode: { name: 'MESSAGE_NOT_FOUND' },
      });
      await expect(service.deleteMessage(message.id)).rejects.toMatchObject({
        errorCode: { name: 'MESSAGE_NOT_FOUND' },
      });
    });
  });
});
