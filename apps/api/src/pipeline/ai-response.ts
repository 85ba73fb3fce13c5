import {
  TOPICS,
  generateEventId,
  platformForMedium,
  type AIResponseReceivedEvent,
} from '@relaydesk/shared';
import { ValidationError } from '../errors.js';
import type { Message } from '../db/schema.js';
import type { EventPublisher } from '../events/publisher.js';
import type { ConversationService } from '../modules/conversations/service.js';
import type { MessageService } from '../modules/messages/service.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ai-response');

/**
 * Consumes ai-response-received: stores the responder's output as an
 * outbound AI message and requests delivery on message-delivery.
 */
export class AIResponseProcessor {
  constructor(
    private readonly conversations: ConversationService,
    private readonly messages: MessageService,
    private readonly publisher: EventPublisher
  ) {}

  async handle(event: AIResponseReceivedEvent): Promise<Message | null> {
    const conversation = await this.conversations.getConversation(
      event.conversationId,
      event.organizationId
    );

    if (!conversation.aiEnabled) {
      log.info(
        { conversationId: conversation.id, eventId: event.eventId },
        'AI disabled on conversation, dropping response'
      );
      return null;
    }

    const platform = platformForMedium(conversation.mediumId);
    if (!platform) {
      throw new ValidationError(`conversation has unknown medium ${conversation.mediumId}`, {
        conversationId: conversation.id,
      });
    }

    const message = await this.messages.createMessage({
      conversationId: conversation.id,
      organizationId: conversation.organizationId,
      direction: 'outbound',
      senderType: 'ai',
      messageType: 'text',
      content: event.response,
      aiGenerated: true,
      aiConfidenceScore: event.confidenceScore,
      idempotencyKey: `ai-response:${event.eventId}`,
      metadata: {
        ai_model: event.model,
        ai_processing_time_ms: event.processingTimeMs,
        reply_to_message_id: event.replyToMessageId,
      },
      status: 'pending',
    });

    await this.publisher.publish(TOPICS.MESSAGE_DELIVERY, {
      eventId: generateEventId('dlv', message.id),
      organizationId: conversation.organizationId,
      createdAt: new Date().toISOString(),
      messageId: message.id,
      conversationId: conversation.id,
      contactId: conversation.contactId,
      platform,
      mediumId: conversation.mediumId,
      replyToMessageId: event.replyToMessageId,
    });

    return message;
  }
}
