import {
  TOPICS,
  countWords,
  generateEventId,
  type CanonicalMessage,
  type WebhookReceivedEvent,
} from '@relaydesk/shared';
import { AppError, NotFoundError, ValidationError, errorMessage, isRetryableError } from '../errors.js';
import type { Message } from '../db/schema.js';
import type { EventPublisher } from '../events/publisher.js';
import type { ContactRepository, UserDirectory } from '../modules/contacts/repository.js';
import type { ConversationService } from '../modules/conversations/service.js';
import type { MessageService } from '../modules/messages/service.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('inbound');

export interface InboundProcessorOptions {
  maxMessageWordCount: number;
}

/**
 * Consumes webhook-received: turns each canonical message into a stored
 * inbound message on the right conversation and announces it on
 * message-created.
 *
 * Message creation is keyed on the platform message id, so redelivering
 * the same event does not duplicate messages.
 */
export class InboundMessageProcessor {
  constructor(
    private readonly contacts: ContactRepository,
    private readonly users: UserDirectory,
    private readonly conversations: ConversationService,
    private readonly messages: MessageService,
    private readonly publisher: EventPublisher,
    private readonly options: InboundProcessorOptions
  ) {}

  async handle(event: WebhookReceivedEvent): Promise<Message[]> {
    const assignee = await this.users.findDefaultAssignee(event.organizationId);
    if (!assignee) {
      throw new NotFoundError('Assignee for organization', event.organizationId, 'ASSIGNEE_NOT_FOUND');
    }

    const created: Message[] = [];
    const retryable: string[] = [];

    for (const [index, canonical] of event.messages.entries()) {
      try {
        created.push(await this.ingest(event, canonical, index, assignee.id));
      } catch (error) {
        const context = {
          webhookEventId: event.webhookEventId,
          platformMessageId: canonical.platformMessageId,
          err: errorMessage(error),
        };
        if (isRetryableError(error)) {
          log.error(context, 'Failed to ingest message');
          retryable.push(errorMessage(error));
        } else {
          log.warn(context, 'Rejected inbound message');
        }
      }
    }

    // Rethrow so the transport redelivers; already-created messages are deduplicated
    if (retryable.length > 0) {
      throw new AppError(
        'BATCH_FAILED',
        `${retryable.length} of ${event.messages.length} messages failed`,
        { webhookEventId: event.webhookEventId, errors: retryable }
      );
    }

    return created;
  }

  private async ingest(
    event: WebhookReceivedEvent,
    canonical: CanonicalMessage,
    index: number,
    userId: string
  ): Promise<Message> {
    const words = countWords(canonical.content);
    if (words > this.options.maxMessageWordCount) {
      throw new ValidationError(
        `message exceeds ${this.options.maxMessageWordCount} words`,
        { words, origin: canonical.origin },
        'MESSAGE_TOO_LONG'
      );
    }

    const contactName = canonical.metadata[`${event.platform}_contact_name`];
    const contact = await this.contacts.findOrCreate({
      organizationId: event.organizationId,
      mediumId: event.mediumId,
      identifier: canonical.origin,
      ...(contactName ? { name: contactName } : {}),
    });

    const conversation = await this.conversations.resolve(
      event.organizationId,
      userId,
      contact.id,
      event.mediumId
    );

    const message = await this.messages.createMessage({
      conversationId: conversation.id,
      organizationId: event.organizationId,
      direction: 'inbound',
      senderType: 'customer',
      senderId: contact.id,
      senderName: contact.name ?? undefined,
      messageType: canonical.messageType,
      content: canonical.content,
      mediaUrl: canonical.mediaUrl,
      metadata: { ...canonical.metadata, webhook_event_id: event.webhookEventId },
      platformMessageId: canonical.platformMessageId,
      // Without a platform id the batch position is stable across redeliveries
      idempotencyKey: canonical.platformMessageId
        ? `${event.platform}:${canonical.platformMessageId}`
        : `${event.platform}:${event.webhookEventId}:${index}`,
      status: 'delivered',
      createdAt: platformTimestamp(event, canonical),
    });

    await this.publisher.publish(TOPICS.MESSAGE_CREATED, {
      eventId: generateEventId('msg', message.id),
      organizationId: event.organizationId,
      createdAt: new Date().toISOString(),
      messageId: message.id,
      conversationId: conversation.id,
      contactId: contact.id,
      platform: event.platform,
      mediumId: event.mediumId,
      direction: message.direction,
      senderType: message.senderType,
      messageType: message.messageType,
      content: message.content,
    });

    return message;
  }
}

function platformTimestamp(
  event: WebhookReceivedEvent,
  canonical: CanonicalMessage
): Date | undefined {
  const raw = canonical.metadata[`${event.platform}_timestamp`];
  if (!raw) return undefined;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
