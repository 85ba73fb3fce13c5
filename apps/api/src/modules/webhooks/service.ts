import {
  TOPICS,
  generateEventId,
  isPlatform,
  type CanonicalMessage,
} from '@relaydesk/shared';
import { PIPELINE_CONFIG } from '../../config/constants.js';
import {
  NotFoundError,
  UnsupportedPlatformError,
  ValidationError,
  errorMessage,
  isRetryableError,
} from '../../errors.js';
import type { PlatformNormalizer } from '../../channels/base.js';
import type { NormalizerRegistry } from '../../channels/registry.js';
import type { WebhookEvent } from '../../db/schema.js';
import type { EventPublisher } from '../../events/publisher.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import type { WebhookEventRepository } from './repository.js';

const log = createLogger('intake');

export interface WebhookIntakeOptions {
  /** Bound on normalization plus forwarding for one attempt */
  processingTimeoutMs: number;
  /** Failed attempts before an event is marked failed */
  maxRetries: number;
}

export interface RetrySweepResult {
  attempted: number;
  processed: number;
  failed: number;
  pending: number;
}

/**
 * Durable webhook intake.
 *
 * Every delivery is stored as pending before anything else happens. A
 * successful attempt forwards the extracted messages on webhook-received
 * and marks the event processed; retryable failures bump the retry count
 * until the bound is reached; structural failures mark it failed at once.
 */
export class WebhookIntakeService {
  constructor(
    private readonly repository: WebhookEventRepository,
    private readonly normalizers: NormalizerRegistry,
    private readonly publisher: EventPublisher,
    private readonly options: WebhookIntakeOptions
  ) {}

  async receive(
    platform: string,
    organizationId: string,
    mediumId: number,
    rawPayload: unknown
  ): Promise<WebhookEvent> {
    const event = await this.repository.create({
      organizationId,
      mediumId,
      platform,
      payload: rawPayload ?? {},
      status: 'pending',
    });

    log.info({ webhookEventId: event.id, platform, organizationId }, 'Webhook received');
    return this.process(event);
  }

  /**
   * Re-run a pending event from its stored payload. Processed and failed
   * events come back unchanged.
   */
  async retry(webhookEventId: string): Promise<WebhookEvent> {
    const event = await this.getEvent(webhookEventId);
    if (event.status !== 'pending') {
      return event;
    }
    log.info({ webhookEventId, retryCount: event.retryCount }, 'Retrying webhook event');
    return this.process(event);
  }

  async retryPending(
    limit: number = PIPELINE_CONFIG.RETRY_SWEEP_BATCH_SIZE
  ): Promise<RetrySweepResult> {
    // Events touched within the processing window may still be in flight
    const staleBefore = new Date(Date.now() - this.options.processingTimeoutMs);
    const events = await this.repository.listRetryable(limit, this.options.maxRetries, staleBefore);
    const result: RetrySweepResult = { attempted: events.length, processed: 0, failed: 0, pending: 0 };

    for (const event of events) {
      const outcome = await this.process(event);
      result[outcome.status]++;
    }

    if (events.length > 0) {
      log.info(result, 'Retry sweep finished');
    }
    return result;
  }

  async getEvent(webhookEventId: string): Promise<WebhookEvent> {
    const event = await this.repository.findById(webhookEventId);
    if (!event) {
      throw new NotFoundError('Webhook event', webhookEventId, 'WEBHOOK_EVENT_NOT_FOUND');
    }
    return event;
  }

  // ============================================
  // PROCESSING
  // ============================================

  private async process(event: WebhookEvent): Promise<WebhookEvent> {
    const normalizer = this.normalizers.get(event.platform);
    if (!normalizer) {
      const error = new UnsupportedPlatformError(event.platform);
      log.warn({ webhookEventId: event.id, platform: event.platform }, error.message);
      return (await this.repository.markFailed(event.id, error.message)) ?? this.reload(event);
    }

    try {
      const forwarded = await withTimeout(
        this.forward(event, normalizer),
        this.options.processingTimeoutMs,
        `processing webhook ${event.id}`
      );

      const processed = await this.repository.markProcessed(event.id);
      log.info(
        { webhookEventId: event.id, platform: event.platform, messages: forwarded },
        'Webhook processed'
      );
      return processed ?? this.reload(event);
    } catch (error) {
      return this.handleFailure(event, error);
    }
  }

  /**
   * Normalize and publish. Returns the number of messages forwarded.
   */
  private async forward(event: WebhookEvent, normalizer: PlatformNormalizer): Promise<number> {
    const validation = normalizer.validate(event.payload);
    if (!validation.ok) {
      throw new ValidationError(validation.error, { platform: event.platform });
    }

    const messages: CanonicalMessage[] = normalizer.extract(event.payload);
    if (messages.length === 0) {
      // Status callbacks and receipts carry nothing to ingest
      return 0;
    }

    if (!isPlatform(event.platform)) {
      throw new UnsupportedPlatformError(event.platform);
    }

    await this.publisher.publish(TOPICS.WEBHOOK_RECEIVED, {
      // Stable per webhook event so a retried publish is deduplicated downstream
      eventId: generateEventId('whr', event.id),
      organizationId: event.organizationId,
      createdAt: new Date().toISOString(),
      webhookEventId: event.id,
      platform: event.platform,
      mediumId: event.mediumId,
      messages,
    });

    return messages.length;
  }

  private async handleFailure(event: WebhookEvent, error: unknown): Promise<WebhookEvent> {
    const message = errorMessage(error);

    if (!isRetryableError(error)) {
      log.warn({ webhookEventId: event.id, err: message }, 'Webhook failed permanently');
      return (await this.repository.markFailed(event.id, message)) ?? this.reload(event);
    }

    const updated = await this.repository.recordFailure(event.id, {
      error: message,
      maxRetries: this.options.maxRetries,
    });

    log.warn(
      {
        webhookEventId: event.id,
        retryCount: updated?.retryCount,
        status: updated?.status,
        err: message,
      },
      'Webhook processing failed'
    );

    return updated ?? this.reload(event);
  }

  private async reload(event: WebhookEvent): Promise<WebhookEvent> {
    return (await this.repository.findById(event.id)) ?? event;
  }
}
