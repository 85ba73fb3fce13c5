import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  integer,
  smallint,
  jsonb,
  index,
  uniqueIndex,
  real,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type {
  AIConfig,
  Attachment,
  ConversationMetadata,
  ConversationPriority,
  ConversationStatus,
  MessageDirection,
  MessageStatusCode,
  MessageType,
  SenderType,
  WebhookEventStatus,
} from '@relaydesk/shared';

// ============================================
// USERS (conversation owners)
// ============================================

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  organizationId: uuid('organization_id').notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  email: varchar('email', { length: 255 }).notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
  organizationIdx: index('idx_users_organization_id').on(table.organizationId, table.createdAt),
  emailIdx: uniqueIndex('idx_users_email').on(table.email),
}));

// ============================================
// CONTACTS
// ============================================

export const contacts = pgTable('contacts', {
  id: uuid('id').primaryKey().defaultRandom(),
  organizationId: uuid('organization_id').notNull(),
  mediumId: smallint('medium_id').notNull(),
  identifier: varchar('identifier', { length: 320 }).notNull(), // phone, platform user id or email address
  name: varchar('name', { length: 255 }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  identityIdx: uniqueIndex('idx_contacts_org_medium_identifier').on(
    table.organizationId,
    table.mediumId,
    table.identifier
  ),
}));

// ============================================
// CONVERSATIONS
// ============================================

export const conversations = pgTable('conversations', {
  id: uuid('id').primaryKey().defaultRandom(),
  organizationId: uuid('organization_id').notNull(),
  userId: uuid('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  contactId: uuid('contact_id').notNull().references(() => contacts.id, { onDelete: 'cascade' }),
  mediumId: smallint('medium_id').notNull(),
  isActive: boolean('is_active').notNull().default(true),
  isArchived: boolean('is_archived').notNull().default(false),
  isDeleted: boolean('is_deleted').notNull().default(false),
  status: varchar('status', { length: 20 }).$type<ConversationStatus>().notNull().default('open'),
  priority: varchar('priority', { length: 20 }).$type<ConversationPriority>().notNull().default('low'),
  aiEnabled: boolean('ai_enabled').notNull().default(true),
  aiConfig: jsonb('ai_config').$type<AIConfig>().notNull().default({}),
  metadata: jsonb('metadata').$type<ConversationMetadata>().notNull().default({}),
  // Denormalized last-message fields (list views read these instead of aggregating messages)
  lastMessageAt: timestamp('last_message_at'),
  lastHumanMessageAt: timestamp('last_human_message_at'),
  lastAiMessageAt: timestamp('last_ai_message_at'),
  lastMessageById: uuid('last_message_by_id'),
  lastMessageByType: varchar('last_message_by_type', { length: 20 }).$type<SenderType>(),
  lastMessageByName: varchar('last_message_by_name', { length: 255 }),
  lastMessageContent: text('last_message_content'),
  lastMessageType: varchar('last_message_type', { length: 20 }).$type<MessageType>(),
  lastMessageMediaUrl: text('last_message_media_url'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  // At most one active conversation per (organization, user, contact, medium)
  activeTupleIdx: uniqueIndex('idx_conversations_active_tuple')
    .on(table.organizationId, table.userId, table.contactId, table.mediumId)
    .where(sql`${table.isActive} = true`),
  tupleIdx: index('idx_conversations_tuple').on(
    table.organizationId,
    table.userId,
    table.contactId,
    table.mediumId
  ),
  lastMessageAtIdx: index('idx_conversations_last_message_at').on(table.organizationId, table.lastMessageAt),
}));

// ============================================
// MESSAGES
// ============================================

export const messages = pgTable('messages', {
  id: uuid('id').primaryKey().defaultRandom(),
  conversationId: uuid('conversation_id').notNull().references(() => conversations.id, { onDelete: 'cascade' }),
  organizationId: uuid('organization_id').notNull(),
  senderType: varchar('sender_type', { length: 20 }).$type<SenderType>().notNull(),
  senderId: uuid('sender_id'),
  senderName: varchar('sender_name', { length: 255 }).notNull(),
  direction: varchar('direction', { length: 10 }).$type<MessageDirection>().notNull(),
  messageType: varchar('message_type', { length: 20 }).$type<MessageType>().notNull(),
  content: text('content').notNull().default(''),
  mediaUrl: text('media_url'),
  attachments: jsonb('attachments').$type<Attachment[]>().notNull().default([]),
  isBroadcast: boolean('is_broadcast').notNull().default(false),
  isOrderMessage: boolean('is_order_message').notNull().default(false),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  platformMessageId: varchar('platform_message_id', { length: 255 }),
  idempotencyKey: varchar('idempotency_key', { length: 255 }),               // Retry deduplication key
  aiGenerated: boolean('ai_generated').notNull().default(false),
  aiConfidenceScore: real('ai_confidence_score'),
  status: integer('status').$type<MessageStatusCode>().notNull().default(0),  // 0 pending .. 4 failed
  deliveredAt: timestamp('delivered_at'),
  readAt: timestamp('read_at'),
  failedAt: timestamp('failed_at'),
  failureReason: text('failure_reason'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  conversationCreatedIdx: index('idx_messages_conversation_created').on(table.conversationId, table.createdAt),
  idempotencyKeyIdx: uniqueIndex('idx_messages_conversation_idempotency').on(table.conversationId, table.idempotencyKey),
  platformMessageIdx: index('idx_messages_platform_message_id').on(table.platformMessageId),
  statusIdx: index('idx_messages_status').on(table.status),
}));

// ============================================
// WEBHOOK EVENTS (audit and replay log)
// ============================================

export const webhookEvents = pgTable('webhook_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  organizationId: uuid('organization_id').notNull(),
  mediumId: smallint('medium_id').notNull(),
  platform: varchar('platform', { length: 50 }).notNull(), // raw tag as received, may be unsupported
  payload: jsonb('payload').$type<unknown>().notNull(),
  status: varchar('status', { length: 20 }).$type<WebhookEventStatus>().notNull().default('pending'),
  errorMessage: text('error_message'),
  retryCount: integer('retry_count').notNull().default(0),
  processedAt: timestamp('processed_at'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
}, (table) => ({
  statusIdx: index('idx_webhook_events_status').on(table.status, table.createdAt),
  organizationIdx: index('idx_webhook_events_organization').on(table.organizationId),
}));

// ============================================
// TYPE EXPORTS
// ============================================

export type User = typeof users.$inferSelect;
export type Contact = typeof contacts.$inferSelect;
export type NewContact = typeof contacts.$inferInsert;
export type Conversation = typeof conversations.$inferSelect;
export type NewConversation = typeof conversations.$inferInsert;
export type Message = typeof messages.$inferSelect;
export type NewMessage = typeof messages.$inferInsert;
export type WebhookEvent = typeof webhookEvents.$inferSelect;
export type NewWebhookEvent = typeof webhookEvents.$inferInsert;
