import { config } from './config/env.js';
import { createNormalizerRegistry, type NormalizerRegistry } from './channels/registry.js';
import type { Database } from './db/index.js';
import { EventConsumer } from './events/consumer.js';
import { EventDeduplicator } from './events/dedup.js';
import { EventPublisher } from './events/publisher.js';
import type { EventTransport } from './events/transport.js';
import {
  DrizzleContactRepository,
  DrizzleUserDirectory,
  type ContactRepository,
  type UserDirectory,
} from './modules/contacts/repository.js';
import {
  DrizzleConversationRepository,
  type ConversationRepository,
} from './modules/conversations/repository.js';
import { ConversationService } from './modules/conversations/service.js';
import { DrizzleMessageRepository, type MessageRepository } from './modules/messages/repository.js';
import { MessageService } from './modules/messages/service.js';
import {
  DrizzleWebhookEventRepository,
  type WebhookEventRepository,
} from './modules/webhooks/repository.js';
import { WebhookRetrySweeper } from './modules/webhooks/retry-sweeper.js';
import { WebhookIntakeService } from './modules/webhooks/service.js';
import { AIResponseProcessor } from './pipeline/ai-response.js';
import { InboundMessageProcessor } from './pipeline/inbound.js';

export interface Repositories {
  webhookEvents: WebhookEventRepository;
  conversations: ConversationRepository;
  messages: MessageRepository;
  contacts: ContactRepository;
  users: UserDirectory;
}

export interface PipelineSettings {
  processingTimeoutMs: number;
  maxWebhookRetries: number;
  publishTimeoutMs: number;
  retryIntervalMs: number;
  maxMessageWordCount: number;
}

export interface Container {
  transport: EventTransport;
  publisher: EventPublisher;
  consumer: EventConsumer;
  dedup: EventDeduplicator;
  normalizers: NormalizerRegistry;
  intake: WebhookIntakeService;
  conversations: ConversationService;
  messages: MessageService;
  inbound: InboundMessageProcessor;
  aiResponses: AIResponseProcessor;
  sweeper: WebhookRetrySweeper;
}

export function createDrizzleRepositories(db: Database): Repositories {
  return {
    webhookEvents: new DrizzleWebhookEventRepository(db),
    conversations: new DrizzleConversationRepository(db),
    messages: new DrizzleMessageRepository(db),
    contacts: new DrizzleContactRepository(db),
    users: new DrizzleUserDirectory(db),
  };
}

/**
 * Wire the pipeline. Nothing here touches global state, so tests build
 * their own container over in-memory repositories and transport.
 */
export function createContainer(
  repositories: Repositories,
  transport: EventTransport,
  settings: PipelineSettings = config.pipeline,
  normalizers: NormalizerRegistry = createNormalizerRegistry()
): Container {
  const publisher = new EventPublisher(transport, settings.publishTimeoutMs);
  const dedup = new EventDeduplicator();
  const consumer = new EventConsumer(transport, dedup);

  const conversations = new ConversationService(repositories.conversations);
  const messages = new MessageService(repositories.messages, repositories.conversations);

  const intake = new WebhookIntakeService(repositories.webhookEvents, normalizers, publisher, {
    processingTimeoutMs: settings.processingTimeoutMs,
    maxRetries: settings.maxWebhookRetries,
  });

  const inbound = new InboundMessageProcessor(
    repositories.contacts,
    repositories.users,
    conversations,
    messages,
    publisher,
    { maxMessageWordCount: settings.maxMessageWordCount }
  );

  return {
    transport,
    publisher,
    consumer,
    dedup,
    normalizers,
    intake,
    conversations,
    messages,
    inbound,
    aiResponses: new AIResponseProcessor(conversations, messages, publisher),
    sweeper: new WebhookRetrySweeper(intake, settings.retryIntervalMs),
  };
}
