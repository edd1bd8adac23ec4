/**
 * Connection Manager
 * Owns every live session: accepts connections, runs each session's receive loop and
 * writer, and guarantees registry cleanup however the session ends.
 *
 * Teardown (release) is one synchronous block: mark the session closed, drop its
 * registry entries, forget it. A dispatch running before that block still finds the
 * session open; one running after finds nothing. There is no state in between.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { describeError, OverflowError, ProtocolError } from '../../lib/errors/broker-errors.js';
import { hashForLog } from '../../utils/security.utils.js';
import type {
  ClientConnection,
  ConnectionAcceptor,
  OverflowPolicy,
  ResourceUri,
  SessionId
} from './broker.types.js';
import { CloseSource, getCloseParams } from './close-reasons.js';
import type { SessionLookup } from './dispatcher.js';
import { decodeClientFrame, encodeServerFrame } from './protocol/frame-codec.js';
import { Session } from './session.js';
import type { SubscriptionRegistry } from './subscription-registry.js';
import { SubscribeRateLimiter, type RateLimitConfig } from './subscribe-rate-limiter.js';

export interface ConnectionManagerOptions {
  outboundQueueMax: number;
  overflowPolicy: OverflowPolicy;
  maxSubscriptionsPerSession: number;
  allowLegacy: boolean;
  subscribeRateLimit?: Partial<RateLimitConfig>;
}

export interface ConnectionStats {
  connections: number;
  resources: number;
  subscriptions: number;
  sessionsAccepted: number;
  messagesSent: number;
  messagesDropped: number;
  messagesFailed: number;
  protocolErrors: number;
  slowConsumersClosed: number;
}

interface LiveSession {
  session: Session;
  connection: ClientConnection;
}

export class ConnectionManager implements SessionLookup {
  private readonly sessions = new Map<SessionId, LiveSession>();
  private readonly tasks = new Map<SessionId, Promise<void>>();
  private readonly rateLimiter: SubscribeRateLimiter;
  private sequence = 0;
  private accepting = true;

  private counters = {
    messagesSent: 0,
    messagesDropped: 0,
    messagesFailed: 0,
    protocolErrors: 0,
    slowConsumersClosed: 0
  };

  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly options: ConnectionManagerOptions
  ) {
    this.rateLimiter = new SubscribeRateLimiter(options.subscribeRateLimit);
  }

  get(sessionId: SessionId): Session | undefined {
    return this.sessions.get(sessionId)?.session;
  }

  subscriptionsOf(sessionId: SessionId): ResourceUri[] {
    return this.registry.resourcesOf(sessionId);
  }

  attach(acceptor: ConnectionAcceptor): void {
    acceptor.onConnection((connection) => {
      this.accept(connection);
    });
  }

  /**
   * Create a session for a new connection and start its loops.
   * Returns null (and closes the connection) once shutdown has begun.
   */
  accept(connection: ClientConnection): Session | null {
    if (!this.accepting) {
      const { code, reason } = getCloseParams(CloseSource.SERVER_SHUTDOWN);
      this.closeConnection(connection, code, reason);
      return null;
    }

    const session = new Session(this.nextSessionId(), {
      queueCapacity: this.options.outboundQueueMax,
      overflowPolicy: this.options.overflowPolicy,
      onOverflow: (slow, result) => this.handleOverflow(slow, result)
    });
    const live: LiveSession = { session, connection };
    this.sessions.set(session.id, live);

    logger.info({
      sessionId: session.id,
      remoteAddress: connection.remoteAddress,
      connections: this.sessions.size,
      event: 'session_accepted'
    }, 'Session accepted');

    const task = this.runSession(live);
    this.tasks.set(session.id, task);
    void task.then(() => this.tasks.delete(session.id));

    return session;
  }

  /**
   * Close one session from the server side
   */
  close(sessionId: SessionId, closeSource: CloseSource = CloseSource.SERVER_SHUTDOWN): boolean {
    return this.release(sessionId, closeSource);
  }

  /**
   * Stop accepting, close every session and wait for their loops to finish
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    const sessionIds = Array.from(this.sessions.keys());

    for (const sessionId of sessionIds) {
      this.release(sessionId, CloseSource.SERVER_SHUTDOWN);
    }

    await Promise.all(this.tasks.values());

    logger.info({
      closedSessions: sessionIds.length,
      event: 'connection_manager_shutdown'
    }, 'Connection manager shutdown');
  }

  getStats(): ConnectionStats {
    const registryStats = this.registry.getStats();
    return {
      connections: this.sessions.size,
      resources: registryStats.resources,
      subscriptions: registryStats.subscriptions,
      sessionsAccepted: this.sequence,
      ...this.counters
    };
  }

  private async runSession(live: LiveSession): Promise<void> {
    const writer = this.runWriter(live);
    await this.runReceiveLoop(live);
    await writer;
  }

  private async runReceiveLoop(live: LiveSession): Promise<void> {
    const { session, connection } = live;
    let closeSource = CloseSource.CLIENT_CLOSE;

    try {
      while (session.isOpen) {
        const frame = await connection.receive();
        if (frame === null || !session.isOpen) {
          break;
        }
        if (this.handleFrame(session, frame) === 'close') {
          break;
        }
      }
    } catch (err) {
      closeSource = CloseSource.TRANSPORT_ERROR;
      logger.warn({
        sessionId: session.id,
        error: describeError(err),
        event: 'session_receive_failed'
      }, 'Session receive failed');
    } finally {
      this.release(session.id, closeSource);
    }
  }

  private async runWriter(live: LiveSession): Promise<void> {
    const { session, connection } = live;

    try {
      for (;;) {
        const message = await session.nextOutbound();
        if (message === null) {
          return;
        }
        await connection.send(encodeServerFrame(message, session.dialect));
        this.counters.messagesSent++;
      }
    } catch (err) {
      this.counters.messagesFailed++;
      logger.warn({
        sessionId: session.id,
        error: describeError(err),
        event: 'session_send_failed'
      }, 'Session send failed');
      this.release(session.id, CloseSource.TRANSPORT_ERROR);
    }
  }

  private handleFrame(session: Session, frame: string): 'continue' | 'close' {
    const decoded = decodeClientFrame(frame, { allowLegacy: this.options.allowLegacy });
    if (!decoded.ok) {
      this.reportProtocolError(session, decoded.error);
      return 'continue';
    }

    if (decoded.dialect === 'legacy' && session.dialect !== 'legacy') {
      session.dialect = 'legacy';
      logger.info({ sessionId: session.id, event: 'session_legacy_dialect' }, 'Session switched to legacy dialect');
    }

    const { command } = decoded;
    switch (command.kind) {
      case 'subscribe':
        this.handleSubscribe(session, command.uri);
        return 'continue';

      case 'unsubscribe': {
        const removed = this.registry.unsubscribe(session.id, command.uri);
        logger.debug({
          sessionId: session.id,
          uriHash: hashForLog(command.uri),
          removed,
          event: 'session_unsubscribed'
        }, 'Session unsubscribe');
        return 'continue';
      }

      case 'close':
        return 'close';
    }
  }

  private handleSubscribe(session: Session, uri: ResourceUri): void {
    if (!this.rateLimiter.check(session.id)) {
      this.reportProtocolError(session, new ProtocolError('rate_limited', 'Too many subscribe requests'));
      return;
    }

    if (
      !this.registry.isSubscribed(session.id, uri) &&
      this.registry.subscriptionCount(session.id) >= this.options.maxSubscriptionsPerSession
    ) {
      this.reportProtocolError(
        session,
        new ProtocolError('subscription_limit', `At most ${this.options.maxSubscriptionsPerSession} subscriptions per connection`)
      );
      return;
    }

    this.registry.subscribe(session.id, uri);
    session.enqueue({ type: 'ack', uri });
  }

  private reportProtocolError(session: Session, error: ProtocolError): void {
    this.counters.protocolErrors++;
    logger.warn({
      sessionId: session.id,
      code: error.code,
      reason: error.message,
      event: 'session_protocol_error'
    }, 'Protocol error');
    session.enqueue({ type: 'error', code: error.code, reason: error.message });
  }

  private handleOverflow(session: Session, result: 'dropped_oldest' | 'overflow'): void {
    this.counters.messagesDropped++;

    if (result === 'dropped_oldest') {
      logger.debug({
        sessionId: session.id,
        capacity: session.queueCapacity,
        droppedTotal: session.droppedCount,
        event: 'session_overflow_drop'
      }, 'Outbound queue full, dropped oldest message');
      return;
    }

    const error = new OverflowError(session.id, session.queueCapacity, session.overflowPolicy);
    this.counters.slowConsumersClosed++;
    logger.warn({
      sessionId: session.id,
      error: error.message,
      event: 'session_slow_consumer'
    }, 'Closing slow consumer');
    this.release(session.id, CloseSource.SLOW_CONSUMER);
  }

  /**
   * Tear a session down. Idempotent; safe from any loop or from dispatch.
   */
  private release(sessionId: SessionId, closeSource: CloseSource): boolean {
    const live = this.sessions.get(sessionId);
    if (!live) {
      return false;
    }

    live.session.close();
    const removed = this.registry.removeSession(sessionId);
    this.sessions.delete(sessionId);
    this.rateLimiter.release(sessionId);

    const { code, reason } = getCloseParams(closeSource);
    this.closeConnection(live.connection, code, reason);

    logger.info({
      sessionId,
      closeSource,
      code,
      removedSubscriptions: removed.length,
      durationMs: Date.now() - live.session.connectedAt,
      connections: this.sessions.size,
      event: 'session_released'
    }, `Session released: ${closeSource}`);

    return true;
  }

  private closeConnection(connection: ClientConnection, code: number, reason: string): void {
    try {
      connection.close(code, reason);
    } catch (err) {
      logger.debug({ error: describeError(err), event: 'connection_close_failed' }, 'Connection close failed');
    }
  }

  private nextSessionId(): SessionId {
    this.sequence++;
    return `s-${Date.now().toString(36)}-${this.sequence.toString(36)}`;
  }
}
