/**
 * Dispatcher
 * Fans one invalidation out to every live subscriber of its resource.
 *
 * A failure for one session (closed, full queue, throwing hook) is counted and logged;
 * it never stops delivery to the others.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { describeError } from '../../lib/errors/broker-errors.js';
import { hashForLog } from '../../utils/security.utils.js';
import type { InvalidationEvent, OutboundMessage, ResourceUri, SessionId } from './broker.types.js';
import type { Session } from './session.js';
import type { SubscriptionRegistry } from './subscription-registry.js';

export interface SessionLookup {
  get(sessionId: SessionId): Session | undefined;
}

export interface DispatchSummary {
  uri: ResourceUri;
  matched: number;
  enqueued: number;
  dropped: number;
  skipped: number;
  failed: number;
}

export class Dispatcher {
  private dispatched = 0;

  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly sessions: SessionLookup
  ) { }

  dispatch(event: InvalidationEvent): DispatchSummary {
    const startTime = performance.now();
    const subscriberIds = this.registry.subscribersOf(event.uri);
    const message: OutboundMessage = event.payload === undefined
      ? { type: 'invalidated', uri: event.uri }
      : { type: 'invalidated', uri: event.uri, payload: event.payload };

    const summary: DispatchSummary = {
      uri: event.uri,
      matched: subscriberIds.length,
      enqueued: 0,
      dropped: 0,
      skipped: 0,
      failed: 0
    };

    for (const sessionId of subscriberIds) {
      // Stale snapshot entry: the session went away after the lookup
      const session = this.sessions.get(sessionId);
      if (!session || !session.isOpen) {
        summary.skipped++;
        continue;
      }

      try {
        switch (session.enqueue(message)) {
          case 'enqueued':
            summary.enqueued++;
            break;
          case 'dropped_oldest':
            summary.enqueued++;
            summary.dropped++;
            break;
          case 'overflow':
            summary.dropped++;
            break;
          case 'closed':
            summary.skipped++;
            break;
        }
      } catch (err) {
        summary.failed++;
        logger.warn({
          sessionId,
          uriHash: hashForLog(event.uri),
          error: describeError(err),
          event: 'dispatch_enqueue_failed'
        }, 'Dispatch to session failed');
      }
    }

    this.dispatched++;

    const level = summary.matched > 0 ? 'info' : 'debug';
    logger[level]({
      uriHash: hashForLog(event.uri),
      matched: summary.matched,
      enqueued: summary.enqueued,
      ...(summary.dropped > 0 && { dropped: summary.dropped }),
      ...(summary.skipped > 0 && { skipped: summary.skipped }),
      ...(summary.failed > 0 && { failed: summary.failed }),
      hasPayload: event.payload !== undefined,
      durationMs: Math.round(performance.now() - startTime),
      event: 'invalidation_dispatched'
    }, 'invalidation_dispatched');

    return summary;
  }

  get dispatchCount(): number {
    return this.dispatched;
  }
}
