import { Queue, Worker, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import type { Topic } from '@relaydesk/shared';
import { QUEUE_CONFIG } from '../../config/constants.js';
import { createLogger } from '../../utils/logger.js';
import type { EventTransport, RawEventHandler } from '../transport.js';

const log = createLogger('transport:bullmq');

export interface BullMQTransportOptions {
  concurrency?: number;
  attempts?: number;
}

/**
 * One BullMQ queue per topic. The event id doubles as the job id, so a
 * republish while the first job is still queued is dropped by Redis.
 */
export class BullMQEventTransport implements EventTransport {
  readonly name = 'bullmq';

  private queues = new Map<Topic, Queue>();
  private workers: Worker[] = [];

  constructor(
    private readonly connection: Redis,
    private readonly options: BullMQTransportOptions = {}
  ) {}

  static fromUrl(url: string, options?: BullMQTransportOptions): BullMQEventTransport {
    // BullMQ workers block on Redis; per-request retries must be off
    const connection = new Redis(url, { maxRetriesPerRequest: null });
    return new BullMQEventTransport(connection, options);
  }

  async publish(topic: Topic, eventId: string, payload: object): Promise<void> {
    const job = await this.queueFor(topic).add(topic, payload, {
      jobId: eventId,
      attempts: this.options.attempts ?? QUEUE_CONFIG.MAX_RETRIES,
      backoff: {
        type: 'exponential',
        delay: QUEUE_CONFIG.RETRY_BACKOFF_MS,
      },
      removeOnComplete: QUEUE_CONFIG.KEEP_COMPLETED,
      removeOnFail: false,
    });

    log.debug({ topic, eventId, jobId: job.id }, 'Event enqueued');
  }

  subscribe(topic: Topic, handler: RawEventHandler): void {
    const worker = new Worker(
      topic,
      async (job: Job) => {
        await handler(job.data);
      },
      {
        connection: this.connection,
        concurrency: this.options.concurrency ?? QUEUE_CONFIG.WORKER_CONCURRENCY,
      }
    );

    worker.on('failed', (job, err) => {
      log.warn(
        { topic, jobId: job?.id, attempt: job?.attemptsMade, err: err.message },
        'Event job failed'
      );
    });

    worker.on('error', (err) => {
      log.error({ topic, err: err.message }, 'Worker error');
    });

    this.workers.push(worker);
    log.info({ topic }, 'Worker started');
  }

  async close(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.close()));
    await Promise.all([...this.queues.values()].map((queue) => queue.close()));
    this.workers = [];
    this.queues.clear();
    await this.connection.quit();
    log.info('BullMQ transport closed');
  }

  private queueFor(topic: Topic): Queue {
    let queue = this.queues.get(topic);
    if (!queue) {
      queue = new Queue(topic, { connection: this.connection });
      this.queues.set(topic, queue);
    }
    return queue;
  }
}
