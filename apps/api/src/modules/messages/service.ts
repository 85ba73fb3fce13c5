import {
  MESSAGE_STATUS,
  SENDER_NAMES,
  messageStatusName,
  truncate,
  type Attachment,
  type MessageDirection,
  type MessageStatus,
  type MessageStatusCode,
  type MessageType,
  type SenderType,
} from '@relaydesk/shared';
import { PIPELINE_CONFIG } from '../../config/constants.js';
import { NotFoundError, ValidationError } from '../../errors.js';
import { createLogger } from '../../utils/logger.js';
import type { Message } from '../../db/schema.js';
import type { ConversationRepository } from '../conversations/repository.js';
import type {
  ListMessagesOptions,
  MessageRepository,
  StatusTransition,
} from './repository.js';

const log = createLogger('messages');

// ============================================
// STATUS STATE MACHINE
// ============================================

/**
 * Statuses a message may hold when moving into the key status.
 * pending -> sent -> delivered -> read, failed from any non-terminal status.
 * Forward jumps are allowed; read and failed are terminal.
 */
const STATUS_PREDECESSORS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: [],
  sent: ['pending'],
  delivered: ['pending', 'sent'],
  read: ['pending', 'sent', 'delivered'],
  failed: ['pending', 'sent', 'delivered'],
};

/**
 * delivered_at, read_at and failed_at are mutually exclusive: entering one
 * terminal-marking status clears the other two.
 * Entering read drops delivered_at on purpose; delivery history is not kept.
 */
function lifecycleStamps(
  status: MessageStatus,
  at: Date,
  failureReason?: string
): Omit<StatusTransition, 'to' | 'from'> {
  return {
    deliveredAt: status === 'delivered' ? at : null,
    readAt: status === 'read' ? at : null,
    failedAt: status === 'failed' ? at : null,
    failureReason: status === 'failed'
      ? failureReason?.trim() || PIPELINE_CONFIG.DEFAULT_FAILURE_REASON
      : null,
  };
}

// ============================================
// TYPES
// ============================================

export interface CreateMessageInput {
  conversationId: string;
  organizationId: string;
  direction: MessageDirection;
  senderType: SenderType;
  senderId?: string | null;
  senderName?: string;
  messageType: MessageType;
  content: string;
  mediaUrl?: string | null;
  attachments?: Attachment[];
  metadata?: Record<string, unknown>;
  platformMessageId?: string;
  /** Retries with the same key return the original message */
  idempotencyKey?: string;
  isBroadcast?: boolean;
  isOrderMessage?: boolean;
  aiGenerated?: boolean;
  aiConfidenceScore?: number;
  status?: MessageStatus;
  failureReason?: string;
  /** When the message was sent on its platform; defaults to now */
  createdAt?: Date;
}

export type StatusUpdateOutcome = 'updated' | 'unchanged' | 'ignored';

export interface StatusUpdateResult {
  outcome: StatusUpdateOutcome;
  message: Message;
}

// ============================================
// SERVICE
// ============================================

/**
 * Creates messages, drives their status lifecycle and keeps the owning
 * conversation's last-message fields current.
 */
export class MessageService {
  constructor(
    private readonly messages: MessageRepository,
    private readonly conversations: ConversationRepository
  ) {}

  async createMessage(input: CreateMessageInput): Promise<Message> {
    const conversation = await this.conversations.findById(input.conversationId);
    if (
      !conversation ||
      conversation.isDeleted ||
      conversation.organizationId !== input.organizationId
    ) {
      throw new NotFoundError('Conversation', input.conversationId, 'CONVERSATION_NOT_FOUND');
    }

    validateContent(input);

    const now = new Date();
    const createdAt = input.createdAt ?? now;
    const status = input.status ?? 'pending';
    const senderName = input.senderName?.trim() || SENDER_NAMES[input.senderType];
    const aiGenerated = input.aiGenerated ?? input.senderType === 'ai';

    const { message, created } = await this.messages.insert({
      conversationId: input.conversationId,
      organizationId: input.organizationId,
      senderType: input.senderType,
      senderId: input.senderId ?? null,
      senderName,
      direction: input.direction,
      messageType: input.messageType,
      content: input.content,
      mediaUrl: input.mediaUrl || null,
      attachments: input.attachments ?? [],
      isBroadcast: input.isBroadcast ?? false,
      isOrderMessage: input.isOrderMessage ?? false,
      metadata: input.metadata ?? {},
      platformMessageId: input.platformMessageId ?? null,
      idempotencyKey: input.idempotencyKey ?? null,
      aiGenerated,
      aiConfidenceScore: input.aiConfidenceScore ?? null,
      status: MESSAGE_STATUS[status],
      ...lifecycleStamps(status, now, input.failureReason),
      createdAt,
      updatedAt: now,
    });

    if (!created) {
      log.debug(
        { messageId: message.id, idempotencyKey: input.idempotencyKey },
        'Duplicate message, returning existing'
      );
      return message;
    }

    await this.conversations.recordLastMessage(message.conversationId, {
      at: message.createdAt,
      byId: message.senderId,
      byType: message.senderType,
      byName: message.senderName,
      content: truncate(message.content, PIPELINE_CONFIG.PREVIEW_MAX_LENGTH),
      type: message.messageType,
      mediaUrl: message.mediaUrl,
      isHumanInbound: message.direction === 'inbound' && !message.aiGenerated && message.senderType !== 'ai',
      isAi: message.aiGenerated || message.senderType === 'ai',
    });

    log.info(
      {
        messageId: message.id,
        conversationId: message.conversationId,
        direction: message.direction,
        senderType: message.senderType,
      },
      'Message created'
    );

    return message;
  }

  /**
   * Move a message along its lifecycle. Repeating the current status is a
   * no-op; moving backward or out of a terminal status is ignored.
   */
  async updateStatus(
    messageId: string,
    newStatus: MessageStatus,
    failureReason?: string
  ): Promise<StatusUpdateResult> {
    const message = await this.getMessage(messageId);
    const current = messageStatusName(message.status);

    if (current === newStatus) {
      return { outcome: 'unchanged', message };
    }

    const predecessors = STATUS_PREDECESSORS[newStatus];
    if (!predecessors.includes(current)) {
      log.warn(
        { messageId, from: current, to: newStatus },
        'Ignoring status transition that would move backward'
      );
      return { outcome: 'ignored', message };
    }

    const updated = await this.messages.transitionStatus(messageId, {
      to: MESSAGE_STATUS[newStatus],
      from: predecessors.map((status): MessageStatusCode => MESSAGE_STATUS[status]),
      ...lifecycleStamps(newStatus, new Date(), failureReason),
    });

    if (updated) {
      log.info({ messageId, from: current, to: newStatus }, 'Message status updated');
      return { outcome: 'updated', message: updated };
    }

    // Guard missed: a concurrent callback moved the row first
    const latest = await this.getMessage(messageId);
    return {
      outcome: messageStatusName(latest.status) === newStatus ? 'unchanged' : 'ignored',
      message: latest,
    };
  }

  async getMessage(messageId: string): Promise<Message> {
    const message = await this.messages.findById(messageId);
    if (!message) {
      throw new NotFoundError('Message', messageId, 'MESSAGE_NOT_FOUND');
    }
    return message;
  }

  /**
   * Page through a conversation newest-first, ordered by created_at
   */
  async listMessages(conversationId: string, options?: ListMessagesOptions): Promise<Message[]> {
    return this.messages.list(conversationId, options);
  }

  /**
   * Administrative hard delete
   */
  async deleteMessage(messageId: string): Promise<void> {
    const deleted = await this.messages.delete(messageId);
    if (!deleted) {
      throw new NotFoundError('Message', messageId, 'MESSAGE_NOT_FOUND');
    }
    log.warn({ messageId }, 'Message hard-deleted');
  }
}

function validateContent(input: CreateMessageInput): void {
  if (input.messageType === 'text') {
    if (!input.content.trim()) {
      throw new ValidationError('text message requires content', {
        conversationId: input.conversationId,
      }, 'INVALID_MESSAGE');
    }
    return;
  }

  if (!input.mediaUrl && !input.attachments?.length) {
    throw new ValidationError(`${input.messageType} message requires a media URL`, {
      conversationId: input.conversationId,
    }, 'INVALID_MESSAGE');
  }
}
