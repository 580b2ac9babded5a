import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { OrchestratorConfig, orchestratorConfig } from '../config/orchestrator.config';
import { errorMessage } from '../common/errors';
import { WebhookOutboxService } from './webhook-outbox.service';

const POLL_MS = 1000;
const SHUTDOWN_GRACE_MS = 2000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Drains the notification outbox: send everything that is due, then sleep.
 * Only runs with a STATUS_WEBHOOK_URL and RUN_NOTIFIER_LOOP enabled.
 */
@Injectable()
export class NotificationDispatcherService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(NotificationDispatcherService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;

  constructor(
    @Inject(orchestratorConfig.KEY) private readonly config: OrchestratorConfig,
    private readonly outbox: WebhookOutboxService,
  ) {}

  onModuleInit(): void {
    if (!this.config.statusWebhookUrl || !this.config.runNotifierLoop) return;
    this.logger.log(`Sending status notifications to ${this.config.statusWebhookUrl}`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (!this.loopPromise) return;
    let grace: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        this.loopPromise,
        new Promise<void>((resolve) => {
          grace = setTimeout(resolve, SHUTDOWN_GRACE_MS);
        }),
      ]);
    } finally {
      clearTimeout(grace);
    }
  }

  /** Send every due notification once. */
  async drain(): Promise<number> {
    let sent = 0;
    while (!this.abort.signal.aborted && (await this.outbox.processOne())) sent++;
    return sent;
  }

  private async runLoop(): Promise<void> {
    while (!this.abort.signal.aborted) {
      try {
        await this.drain();
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Outbox drain failed: ${errorMessage(err)}`);
      }
      await sleep(POLL_MS);
    }
  }
}
