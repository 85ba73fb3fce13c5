import { errorMessage } from '../../errors.js';
import { createLogger } from '../../utils/logger.js';
import type { RetrySweepResult, WebhookIntakeService } from './service.js';

const log = createLogger('retry-sweeper');

/**
 * Periodically re-runs pending webhook events. Sweeps never overlap.
 */
export class WebhookRetrySweeper {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly intake: WebhookIntakeService,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();

    log.info({ intervalMs: this.intervalMs }, 'Retry sweeper started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Resolves null when a sweep is already in progress
   */
  async runOnce(): Promise<RetrySweepResult | null> {
    if (this.running) return null;
    this.running = true;

    try {
      return await this.intake.retryPending();
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'Retry sweep failed');
      return null;
    } finally {
      this.running = false;
    }
  }
}
