/**
 * Subscribe Rate Limiter
 * Per-session token bucket for subscribe frames
 */

import type { SessionId } from './broker.types.js';

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export interface RateLimitConfig {
  maxTokens: number;      // Bucket size (burst)
  refillPerSecond: number;
}

export class SubscribeRateLimiter {
  private buckets = new Map<SessionId, Bucket>();
  private config: RateLimitConfig;

  constructor(
    config?: Partial<RateLimitConfig>,
    private readonly now: () => number = Date.now
  ) {
    this.config = {
      maxTokens: config?.maxTokens ?? 100,
      refillPerSecond: config?.refillPerSecond ?? 20
    };
  }

  /**
   * Consume one token; false when the session is over its rate
   */
  check(sessionId: SessionId): boolean {
    const now = this.now();
    let bucket = this.buckets.get(sessionId);

    if (!bucket) {
      bucket = { tokens: this.config.maxTokens, lastRefill: now };
      this.buckets.set(sessionId, bucket);
    }

    const elapsedSeconds = (now - bucket.lastRefill) / 1000;
    bucket.tokens = Math.min(this.config.maxTokens, bucket.tokens + elapsedSeconds * this.config.refillPerSecond);
    bucket.lastRefill = now;

    if (bucket.tokens < 1) {
      return false;
    }

    bucket.tokens -= 1;
    return true;
  }

  release(sessionId: SessionId): void {
    this.buckets.delete(sessionId);
  }

  get trackedSessions(): number {
    return this.buckets.size;
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }
}
