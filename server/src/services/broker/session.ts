/**
 * Connection Session
 * Broker-side state for one connected client: identity, dialect and the bounded
 * outbound queue its writer drains.
 *
 * The session's subscription set is the registry's reverse-index entry for its id;
 * it is not duplicated here.
 */

import { BoundedQueue } from '../../lib/concurrency/bounded-queue.js';
import type { FrameDialect, OutboundMessage, OverflowPolicy, SessionId } from './broker.types.js';

/**
 * enqueued        - buffered for the writer
 * dropped_oldest  - buffered, the oldest undelivered message was evicted
 * overflow        - queue full under the disconnect policy; message not buffered
 * closed          - session already torn down; message not buffered
 */
export type EnqueueResult = 'enqueued' | 'dropped_oldest' | 'overflow' | 'closed';

export interface SessionOptions {
  queueCapacity: number;
  overflowPolicy: OverflowPolicy;
  onOverflow?: (session: Session, result: 'dropped_oldest' | 'overflow') => void;
}

export class Session {
  readonly connectedAt = Date.now();
  dialect: FrameDialect = 'v1';

  private readonly outbound: BoundedQueue<OutboundMessage>;
  private open = true;
  private dropped = 0;

  constructor(
    readonly id: SessionId,
    private readonly options: SessionOptions
  ) {
    this.outbound = new BoundedQueue<OutboundMessage>(
      options.queueCapacity,
      options.overflowPolicy === 'drop_oldest' ? 'drop_oldest' : 'reject'
    );
  }

  get isOpen(): boolean {
    return this.open;
  }

  get pendingCount(): number {
    return this.outbound.size;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get queueCapacity(): number {
    return this.options.queueCapacity;
  }

  get overflowPolicy(): OverflowPolicy {
    return this.options.overflowPolicy;
  }

  /**
   * Never blocks; the overflow policy decides what happens to a full queue
   */
  enqueue(message: OutboundMessage): EnqueueResult {
    if (!this.open) {
      return 'closed';
    }

    switch (this.outbound.offer(message)) {
      case 'accepted':
        return 'enqueued';
      case 'closed':
        return 'closed';
      case 'dropped_oldest':
        this.dropped++;
        this.options.onOverflow?.(this, 'dropped_oldest');
        return 'dropped_oldest';
      case 'rejected':
        this.dropped++;
        this.options.onOverflow?.(this, 'overflow');
        return 'overflow';
    }
  }

  /**
   * Next message for the writer; null once the session is closed
   */
  nextOutbound(): Promise<OutboundMessage | null> {
    return this.outbound.take();
  }

  /**
   * Discard undelivered messages and wake the writer. Returns false if already closed.
   */
  close(): boolean {
    if (!this.open) {
      return false;
    }
    this.open = false;
    this.outbound.clear();
    this.outbound.close();
    return true;
  }
}
