/**
 * Subscription Registry
 * Bidirectional index between resources and the sessions interested in them.
 *
 * forward: uri -> sessions      (dispatch lookups)
 * reverse: session -> uris      (O(subscriptions) cleanup on disconnect)
 *
 * Invariant: sessionId ∈ forward[uri] ⇔ uri ∈ reverse[sessionId].
 * Every method is synchronous, so each call runs to completion on the event loop and
 * these four methods are the only places the indices change. Empty sets are pruned on
 * both sides.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { hashForLog } from '../../utils/security.utils.js';
import type { ResourceUri, SessionId } from './broker.types.js';

export interface RegistryStats {
  resources: number;
  sessions: number;
  subscriptions: number;
}

export class SubscriptionRegistry {
  private readonly forward = new Map<ResourceUri, Set<SessionId>>();
  private readonly reverse = new Map<SessionId, Set<ResourceUri>>();

  /**
   * Returns false when the pair was already registered
   */
  subscribe(sessionId: SessionId, uri: ResourceUri): boolean {
    let sessions = this.forward.get(uri);
    if (sessions?.has(sessionId)) {
      return false;
    }
    if (!sessions) {
      sessions = new Set();
      this.forward.set(uri, sessions);
    }
    sessions.add(sessionId);

    let uris = this.reverse.get(sessionId);
    if (!uris) {
      uris = new Set();
      this.reverse.set(sessionId, uris);
    }
    uris.add(uri);

    logger.debug({
      sessionId,
      uriHash: hashForLog(uri),
      subscriberCount: sessions.size,
      event: 'registry_subscribed'
    }, 'Session subscribed to resource');

    return true;
  }

  /**
   * Returns false when the pair was not registered
   */
  unsubscribe(sessionId: SessionId, uri: ResourceUri): boolean {
    const sessions = this.forward.get(uri);
    if (!sessions || !sessions.delete(sessionId)) {
      return false;
    }
    if (sessions.size === 0) {
      this.forward.delete(uri);
    }

    const uris = this.reverse.get(sessionId);
    if (uris) {
      uris.delete(uri);
      if (uris.size === 0) {
        this.reverse.delete(sessionId);
      }
    }

    logger.debug({
      sessionId,
      uriHash: hashForLog(uri),
      event: 'registry_unsubscribed'
    }, 'Session unsubscribed from resource');

    return true;
  }

  /**
   * Snapshot of the sessions interested in uri. The array is a copy: sessions may
   * disconnect while the caller iterates it.
   */
  subscribersOf(uri: ResourceUri): SessionId[] {
    const sessions = this.forward.get(uri);
    return sessions ? Array.from(sessions) : [];
  }

  resourcesOf(sessionId: SessionId): ResourceUri[] {
    const uris = this.reverse.get(sessionId);
    return uris ? Array.from(uris) : [];
  }

  isSubscribed(sessionId: SessionId, uri: ResourceUri): boolean {
    return this.forward.get(uri)?.has(sessionId) ?? false;
  }

  subscriptionCount(sessionId: SessionId): number {
    return this.reverse.get(sessionId)?.size ?? 0;
  }

  /**
   * Remove a session from every resource it watches; returns the uris it held
   */
  removeSession(sessionId: SessionId): ResourceUri[] {
    const uris = this.reverse.get(sessionId);
    if (!uris) {
      return [];
    }
    this.reverse.delete(sessionId);

    for (const uri of uris) {
      const sessions = this.forward.get(uri);
      if (sessions) {
        sessions.delete(sessionId);
        if (sessions.size === 0) {
          this.forward.delete(uri);
        }
      }
    }

    return Array.from(uris);
  }

  getStats(): RegistryStats {
    let subscriptions = 0;
    for (const uris of this.reverse.values()) {
      subscriptions += uris.size;
    }
    return {
      resources: this.forward.size,
      sessions: this.reverse.size,
      subscriptions
    };
  }
}
