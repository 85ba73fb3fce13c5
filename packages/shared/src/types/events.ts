import type {
  CanonicalMessage,
  MessageDirection,
  MessageType,
  Platform,
  SenderType,
} from './index.js';

// ============================================
// TOPICS
// ============================================

export const TOPICS = {
  WEBHOOK_RECEIVED: 'webhook-received',
  MESSAGE_CREATED: 'message-created',
  AI_RESPONSE_RECEIVED: 'ai-response-received',
  MESSAGE_DELIVERY: 'message-delivery',
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];

// ============================================
// EVENT PAYLOADS
// ============================================

/**
 * Fields every event carries. Consumers deduplicate on eventId.
 */
export interface EventEnvelope {
  eventId: string;
  organizationId: string;
  createdAt: string;
}

export interface WebhookReceivedEvent extends EventEnvelope {
  webhookEventId: string;
  platform: Platform;
  mediumId: number;
  messages: CanonicalMessage[];
}

export interface MessageCreatedEvent extends EventEnvelope {
  messageId: string;
  conversationId: string;
  contactId: string;
  platform: Platform;
  mediumId: number;
  direction: MessageDirection;
  senderType: SenderType;
  messageType: MessageType;
  content: string;
}

export interface AIResponseReceivedEvent extends EventEnvelope {
  conversationId: string;
  replyToMessageId: string;
  response: string;
  model: string;
  confidenceScore: number;
  processingTimeMs: number;
}

export interface MessageDeliveryEvent extends EventEnvelope {
  messageId: string;
  conversationId: string;
  contactId: string;
  platform: Platform;
  mediumId: number;
  replyToMessageId?: string;
}

export interface EventByTopic {
  'webhook-received': WebhookReceivedEvent;
  'message-created': MessageCreatedEvent;
  'ai-response-received': AIResponseReceivedEvent;
  'message-delivery': MessageDeliveryEvent;
}
