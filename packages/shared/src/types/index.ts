// Core platform types
export const PLATFORMS = ['whatsapp', 'instagram', 'facebook', 'email'] as const;

export type Platform = (typeof PLATFORMS)[number];

/**
 * Medium ids as stored on conversations and webhook events
 */
export const MEDIUM_IDS = {
  whatsapp: 1,
  instagram: 2,
  facebook: 3,
  email: 4,
} as const satisfies Record<Platform, number>;

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

export function platformForMedium(mediumId: number): Platform | undefined {
  return PLATFORMS.find((platform) => MEDIUM_IDS[platform] === mediumId);
}

export const MESSAGE_TYPES = ['text', 'image', 'video', 'audio', 'document', 'sticker'] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

// ============================================
// MESSAGE STATUS
// ============================================

/**
 * Ordinal status codes shared with delivery-status callbacks
 */
export const MESSAGE_STATUS = {
  pending: 0,
  sent: 1,
  delivered: 2,
  read: 3,
  failed: 4,
} as const;

export type MessageStatus = keyof typeof MESSAGE_STATUS;

export type MessageStatusCode = (typeof MESSAGE_STATUS)[MessageStatus];

export const MESSAGE_STATUSES = ['pending', 'sent', 'delivered', 'read', 'failed'] as const satisfies readonly MessageStatus[];

export function messageStatusName(code: MessageStatusCode): MessageStatus {
  return MESSAGE_STATUSES[code];
}

/**
 * Accepts a status name or its ordinal code
 */
export function parseMessageStatus(value: unknown): MessageStatus | null {
  if (typeof value === 'number') {
    return MESSAGE_STATUSES.find((status) => MESSAGE_STATUS[status] === value) ?? null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (/^\d+$/.test(trimmed)) {
      return parseMessageStatus(Number(trimmed));
    }
    return MESSAGE_STATUSES.find((status) => status === trimmed) ?? null;
  }
  return null;
}

// ============================================
// SENDERS & CONVERSATIONS
// ============================================

export const SENDER_TYPES = ['customer', 'agent', 'ai', 'system'] as const;

export type SenderType = (typeof SENDER_TYPES)[number];

export const SENDER_NAMES: Record<SenderType, string> = {
  customer: 'Customer',
  agent: 'Agent',
  ai: 'AI Assistant',
  system: 'System',
};

export const MESSAGE_DIRECTIONS = ['inbound', 'outbound'] as const;

export type MessageDirection = (typeof MESSAGE_DIRECTIONS)[number];

export const CONVERSATION_STATUSES = ['open', 'closed', 'pending', 'resolved'] as const;

export type ConversationStatus = (typeof CONVERSATION_STATUSES)[number];

export const CONVERSATION_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;

export type ConversationPriority = (typeof CONVERSATION_PRIORITIES)[number];

export const WEBHOOK_EVENT_STATUSES = ['pending', 'processed', 'failed'] as const;

export type WebhookEventStatus = (typeof WEBHOOK_EVENT_STATUSES)[number];

export interface AIConfig {
  model?: string;
  temperature?: number;
  systemPrompt?: string;
  autoReply?: boolean;
}

export type ConversationMetadata = Record<string, unknown>;

export interface Attachment {
  type: MessageType;
  url: string;
  name?: string;
  mimeType?: string;
  size?: number;
}

// ============================================
// CANONICAL MESSAGE
// ============================================

/**
 * Platform-independent form of one inbound unit of communication
 */
export interface CanonicalMessage {
  origin: string;
  content: string;
  mediaUrl: string;
  messageType: MessageType;
  metadata: Record<string, string>;
  platformMessageId?: string;
}

// Re-export all types
export * from './events.js';
export * from './errors.js';
