import { z } from 'zod';
import {
  MESSAGE_DIRECTIONS,
  MESSAGE_TYPES,
  PLATFORMS,
  SENDER_TYPES,
  type EventByTopic,
  type Topic,
} from '@relaydesk/shared';

// ============================================
// EVENT ENVELOPE SCHEMAS
// ============================================

const envelope = {
  eventId: z.string().min(1),
  organizationId: z.string().min(1),
  createdAt: z.string().min(1),
};

export const canonicalMessageSchema = z.object({
  origin: z.string().min(1),
  content: z.string(),
  mediaUrl: z.string(),
  messageType: z.enum(MESSAGE_TYPES),
  metadata: z.record(z.string()),
  platformMessageId: z.string().optional(),
});

export const webhookReceivedSchema = z.object({
  ...envelope,
  webhookEventId: z.string().min(1),
  platform: z.enum(PLATFORMS),
  mediumId: z.number().int(),
  messages: z.array(canonicalMessageSchema),
});

export const messageCreatedSchema = z.object({
  ...envelope,
  messageId: z.string().min(1),
  conversationId: z.string().min(1),
  contactId: z.string().min(1),
  platform: z.enum(PLATFORMS),
  mediumId: z.number().int(),
  direction: z.enum(MESSAGE_DIRECTIONS),
  senderType: z.enum(SENDER_TYPES),
  messageType: z.enum(MESSAGE_TYPES),
  content: z.string(),
});

export const aiResponseReceivedSchema = z.object({
  ...envelope,
  conversationId: z.string().min(1),
  replyToMessageId: z.string().min(1),
  response: z.string().min(1),
  model: z.string(),
  confidenceScore: z.number().min(0).max(1),
  processingTimeMs: z.number().nonnegative(),
});

export const messageDeliverySchema = z.object({
  ...envelope,
  messageId: z.string().min(1),
  conversationId: z.string().min(1),
  contactId: z.string().min(1),
  platform: z.enum(PLATFORMS),
  mediumId: z.number().int(),
  replyToMessageId: z.string().optional(),
});

export const EVENT_SCHEMAS: { [T in Topic]: z.ZodType<EventByTopic[T]> } = {
  'webhook-received': webhookReceivedSchema,
  'message-created': messageCreatedSchema,
  'ai-response-received': aiResponseReceivedSchema,
  'message-delivery': messageDeliverySchema,
};
