/**
 * Redis Change Feed
 * Lets the backend report changes by publishing on a Redis channel instead of calling
 * the HTTP ingest. Each message is one change request (same JSON shapes as HTTP).
 */

import { Redis } from 'ioredis';
import { logger } from '../../lib/logger/structured-logger.js';
import { describeError } from '../../lib/errors/broker-errors.js';
import type { BackendIngest } from '../../services/broker/backend-ingest.js';
import { parseChangeMessage } from '../../services/broker/protocol/change-schemas.js';

/**
 * The part of an ioredis subscriber connection the feed uses
 */
export interface ChangeFeedClient {
  subscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  quit(): Promise<unknown>;
}

export function createChangeFeedClient(url: string): ChangeFeedClient {
  const useTls = url.startsWith('rediss://');
  const client = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    retryStrategy: (times: number) => Math.min(times * 200, 5000),
    ...(useTls && { tls: {} }),
  });

  client.on('error', (err: Error) => {
    logger.warn({ error: err.message, event: 'change_feed_redis_error' }, 'Change feed Redis connection error');
  });

  return client;
}

export class RedisChangeFeed {
  private received = 0;
  private rejected = 0;

  constructor(
    private readonly client: ChangeFeedClient,
    private readonly ingest: BackendIngest,
    private readonly channel: string
  ) { }

  async start(): Promise<void> {
    this.client.on('message', (channel, message) => {
      if (channel !== this.channel) return;
      this.handleMessage(message).catch((err: unknown) => {
        logger.error({ error: describeError(err), event: 'change_feed_handler_error' }, 'Change feed handler failed');
      });
    });

    await this.client.subscribe(this.channel);
    logger.info({ channel: this.channel, event: 'change_feed_subscribed' }, 'Change feed subscribed');
  }

  /**
   * Returns the number of changes handed to the ingest
   */
  async handleMessage(raw: string): Promise<number> {
    this.received++;

    const parsed = parseChangeMessage(raw);
    if (!parsed.ok) {
      this.rejected++;
      logger.warn({
        channel: this.channel,
        reason: parsed.error.message,
        event: 'change_feed_message_rejected'
      }, 'Change feed message rejected');
      return 0;
    }

    let reported = 0;
    for (const change of parsed.changes) {
      try {
        await this.ingest.reportChange(change.uri, change.payload);
        reported++;
      } catch (err) {
        this.rejected++;
        logger.warn({
          channel: this.channel,
          error: describeError(err),
          event: 'change_feed_report_failed'
        }, 'Change feed report failed');
      }
    }
    return reported;
  }

  getStats(): { received: number; rejected: number } {
    return { received: this.received, rejected: this.rejected };
  }

  async stop(): Promise<void> {
    await this.client.quit();
    logger.info({ channel: this.channel, event: 'change_feed_stopped' }, 'Change feed stopped');
  }
}
