import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { WebhookOutbox } from '../database/entities';
import { errorMessage } from '../common/errors';

/** One claimed notification to send (from webhooks_outbox). */
export interface WebhookOutboxItem {
  id: string;
  event_type: string;
  payload: Record<string, unknown>;
  webhook_url: string;
  retry_count: number;
  max_retries: number;
}

const DEFAULT_MAX_RETRIES = 5;
/** A claim older than this belongs to a dispatcher that died mid-delivery. */
const CLAIM_LEASE_SECONDS = 300;
const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Notification outbox: status updates are persisted first, then POSTed by the
 * dispatcher loop; failures retry with exponential backoff (2^n seconds).
 */
@Injectable()
export class WebhookOutboxService {
  private readonly logger = new Logger(WebhookOutboxService.name);

  constructor(private readonly dataSource: DataSource) {}

  async enqueue(
    eventType: string,
    payload: Record<string, unknown>,
    webhookUrl: string,
    maxRetries = DEFAULT_MAX_RETRIES,
  ): Promise<WebhookOutbox> {
    const row = this.dataSource.manager.create(WebhookOutbox, {
      event_type: eventType,
      payload,
      webhook_url: webhookUrl,
      status: 'pending',
      retry_count: 0,
      max_retries: maxRetries,
      next_retry_at: new Date(),
    });
    return this.dataSource.manager.save(row);
  }

  /**
   * Claim the next due notification and stamp the claim. Due means pending with
   * next_retry_at <= now, or processing under a claim older than the lease.
   * SKIP LOCKED lets several orchestrator processes drain the same outbox.
   */
  async claimNext(): Promise<WebhookOutboxItem | null> {
    const result: unknown = await this.dataSource.query(
      `
      UPDATE webhooks_outbox
      SET status = 'processing', claimed_at = NOW()
      WHERE id = (
        SELECT id FROM webhooks_outbox
        WHERE (status = 'pending' AND next_retry_at <= NOW())
           OR (status = 'processing' AND (claimed_at IS NULL OR claimed_at < NOW() - $1::interval))
        ORDER BY next_retry_at ASC
        FOR UPDATE SKIP LOCKED
        LIMIT 1
      )
      RETURNING id, event_type, payload, webhook_url, retry_count, max_retries
      `,
      [`${CLAIM_LEASE_SECONDS} seconds`],
    );
    const row = firstRow(result);
    return row ? mapRowToOutboxItem(row) : null;
  }

  async markProcessed(id: string): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE webhooks_outbox
      SET status = 'processed', processed_at = NOW(), claimed_at = NULL
      WHERE id = $1
      `,
      [id],
    );
  }

  /** Back off 2^(retry+1) seconds, or give up once max_retries is reached. */
  async markFailed(id: string): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE webhooks_outbox
      SET status = CASE WHEN retry_count + 1 >= max_retries THEN 'failed' ELSE 'pending' END,
          retry_count = retry_count + 1,
          claimed_at = NULL,
          next_retry_at = CASE
            WHEN retry_count + 1 >= max_retries THEN next_retry_at
            ELSE NOW() + (power(2, retry_count + 1) || ' seconds')::interval
          END
      WHERE id = $1
      `,
      [id],
    );
  }

  /**
   * Claim one notification, POST it, mark processed or failed.
   * @returns false when nothing was due
   */
  async processOne(): Promise<boolean> {
    const item = await this.claimNext();
    if (!item) return false;

    try {
      const res = await fetch(item.webhook_url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ event_type: item.event_type, ...item.payload }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      await this.markProcessed(item.id);
    } catch (err) {
      const attempt = item.retry_count + 1;
      this.logger.warn(
        `Notification ${item.id} (${item.event_type}) attempt ${attempt} failed: ${errorMessage(err)}`,
      );
      await this.markFailed(item.id);
    }
    return true;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstRow(result: unknown): Record<string, unknown> | null {
  if (!Array.isArray(result)) return null;
  // UPDATE ... RETURNING comes back as [rows, affectedCount] from the postgres driver
  const rows: unknown = Array.isArray(result[0]) ? result[0] : result;
  if (!Array.isArray(rows)) return null;
  const row: unknown = rows[0];
  return isRecord(row) ? row : null;
}

function mapRowToOutboxItem(row: Record<string, unknown>): WebhookOutboxItem {
  return {
    id: String(row.id),
    event_type: String(row.event_type),
    payload: isRecord(row.payload) ? row.payload : {},
    webhook_url: String(row.webhook_url),
    retry_count: Number(row.retry_count),
    max_retries: Number(row.max_retries),
  };
}
