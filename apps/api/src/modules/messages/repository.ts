import { and, desc, eq, inArray, lt } from 'drizzle-orm';
import type { MessageStatusCode } from '@relaydesk/shared';
import type { Database } from '../../db/index.js';
import { messages, type Message, type NewMessage } from '../../db/schema.js';

export interface StatusTransition {
  to: MessageStatusCode;
  /** Statuses the row must currently hold for the update to apply */
  from: readonly MessageStatusCode[];
  deliveredAt: Date | null;
  readAt: Date | null;
  failedAt: Date | null;
  failureReason: string | null;
}

export interface ListMessagesOptions {
  limit?: number;
  before?: Date;
}

export interface InsertResult {
  message: Message;
  created: boolean;
}

export interface MessageRepository {
  /**
   * Insert unless (conversationId, idempotencyKey) already exists, in which
   * case the existing row comes back with created = false.
   */
  insert(values: NewMessage): Promise<InsertResult>;

  findById(id: string): Promise<Message | null>;

  /**
   * Conditional update: applies only while the current status is in
   * `from`. Resolves null when the guard did not match (or no such row).
   */
  transitionStatus(id: string, transition: StatusTransition): Promise<Message | null>;

  /** Newest first */
  list(conversationId: string, options?: ListMessagesOptions): Promise<Message[]>;

  delete(id: string): Promise<boolean>;
}

export class DrizzleMessageRepository implements MessageRepository {
  constructor(private readonly db: Database) {}

  async insert(values: NewMessage): Promise<InsertResult> {
    const [created] = await this.db
      .insert(messages)
      .values(values)
      .onConflictDoNothing({ target: [messages.conversationId, messages.idempotencyKey] })
      .returning();

    if (created) {
      return { message: created, created: true };
    }

    const key = values.idempotencyKey;
    if (!key) {
      throw new Error('Message insert returned no row');
    }

    const [existing] = await this.db
      .select()
      .from(messages)
      .where(and(
        eq(messages.conversationId, values.conversationId),
        eq(messages.idempotencyKey, key)
      ))
      .limit(1);

    if (!existing) {
      throw new Error(`Message with idempotency key ${key} vanished after conflict`);
    }

    return { message: existing, created: false };
  }

  async findById(id: string): Promise<Message | null> {
    const [row] = await this.db
      .select()
      .from(messages)
      .where(eq(messages.id, id))
      .limit(1);
    return row ?? null;
  }

  async transitionStatus(id: string, transition: StatusTransition): Promise<Message | null> {
    if (transition.from.length === 0) return null;

    const [row] = await this.db
      .update(messages)
      .set({
        status: transition.to,
        deliveredAt: transition.deliveredAt,
        readAt: transition.readAt,
        failedAt: transition.failedAt,
        failureReason: transition.failureReason,
        updatedAt: new Date(),
      })
      .where(and(
        eq(messages.id, id),
        inArray(messages.status, [...transition.from])
      ))
      .returning();

    return row ?? null;
  }

  async list(conversationId: string, options: ListMessagesOptions = {}): Promise<Message[]> {
    const conditions = [eq(messages.conversationId, conversationId)];
    if (options.before) {
      conditions.push(lt(messages.createdAt, options.before));
    }

    return this.db
      .select()
      .from(messages)
      .where(and(...conditions))
      .orderBy(desc(messages.createdAt))
      .limit(options.limit ?? 50);
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(messages)
      .where(eq(messages.id, id))
      .returning({ id: messages.id });
    return deleted.length > 0;
  }
}
