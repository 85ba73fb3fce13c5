import { and, asc, eq, lt, sql } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { webhookEvents, type NewWebhookEvent, type WebhookEvent } from '../../db/schema.js';

export interface FailureRecord {
  error: string;
  /** Failures at or beyond this count move the event to failed */
  maxRetries: number;
}

/**
 * Every mutation is guarded on status = 'pending': processed and failed
 * events are never touched again.
 */
export interface WebhookEventRepository {
  create(values: NewWebhookEvent): Promise<WebhookEvent>;
  findById(id: string): Promise<WebhookEvent | null>;
  markProcessed(id: string): Promise<WebhookEvent | null>;
  markFailed(id: string, error: string): Promise<WebhookEvent | null>;
  recordFailure(id: string, failure: FailureRecord): Promise<WebhookEvent | null>;
  /** Pending events under the retry bound, untouched since `staleBefore` */
  listRetryable(limit: number, maxRetries: number, staleBefore: Date): Promise<WebhookEvent[]>;
}

export class DrizzleWebhookEventRepository implements WebhookEventRepository {
  constructor(private readonly db: Database) {}

  async create(values: NewWebhookEvent): Promise<WebhookEvent> {
    const [row] = await this.db.insert(webhookEvents).values(values).returning();
    if (!row) {
      throw new Error('Webhook event insert returned no row');
    }
    return row;
  }

  async findById(id: string): Promise<WebhookEvent | null> {
    const [row] = await this.db
      .select()
      .from(webhookEvents)
      .where(eq(webhookEvents.id, id))
      .limit(1);
    return row ?? null;
  }

  async markProcessed(id: string): Promise<WebhookEvent | null> {
    const now = new Date();
    const [row] = await this.db
      .update(webhookEvents)
      .set({ status: 'processed', processedAt: now, errorMessage: null, updatedAt: now })
      .where(and(eq(webhookEvents.id, id), eq(webhookEvents.status, 'pending')))
      .returning();
    return row ?? null;
  }

  async markFailed(id: string, error: string): Promise<WebhookEvent | null> {
    const [row] = await this.db
      .update(webhookEvents)
      .set({ status: 'failed', errorMessage: error, updatedAt: new Date() })
      .where(and(eq(webhookEvents.id, id), eq(webhookEvents.status, 'pending')))
      .returning();
    return row ?? null;
  }

  async recordFailure(id: string, failure: FailureRecord): Promise<WebhookEvent | null> {
    const [row] = await this.db
      .update(webhookEvents)
      .set({
        retryCount: sql`${webhookEvents.retryCount} + 1`,
        status: sql`CASE WHEN ${webhookEvents.retryCount} + 1 >= ${failure.maxRetries} THEN 'failed' ELSE 'pending' END`,
        errorMessage: failure.error,
        updatedAt: new Date(),
      })
      .where(and(eq(webhookEvents.id, id), eq(webhookEvents.status, 'pending')))
      .returning();
    return row ?? null;
  }

  async listRetryable(limit: number, maxRetries: number, staleBefore: Date): Promise<WebhookEvent[]> {
    return this.db
      .select()
      .from(webhookEvents)
      .where(and(
        eq(webhookEvents.status, 'pending'),
        lt(webhookEvents.retryCount, maxRetries),
        lt(webhookEvents.updatedAt, staleBefore)
      ))
      .orderBy(asc(webhookEvents.createdAt))
      .limit(limit);
  }
}
