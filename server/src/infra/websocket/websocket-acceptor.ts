/**
 * WebSocket Acceptor
 * Runs the `ws` server on the shared HTTP server and hands every new socket to the
 * broker as a ClientConnection. Owns the ws-specific chores: heartbeat ping/pong,
 * idle timeout, payload limit.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import { logger } from '../../lib/logger/structured-logger.js';
import type { ClientConnection, ConnectionAcceptor } from '../../services/broker/broker.types.js';
import { CloseSource, getCloseParams } from '../../services/broker/close-reasons.js';
import { WsClientConnection } from './ws-client-connection.js';

export interface WebSocketAcceptorConfig {
  path: string;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;     // 0 disables
  maxPayloadBytes: number;
  inboundQueueMax: number;
}

export class WebSocketAcceptor implements ConnectionAcceptor {
  private readonly wss: WebSocketServer;
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private heartbeatInterval: NodeJS.Timeout | undefined;
  private handler: ((connection: ClientConnection) => void) | null = null;

  constructor(server: HTTPServer, private readonly config: WebSocketAcceptorConfig) {
    this.wss = new WebSocketServer({
      server,
      path: config.path,
      maxPayload: config.maxPayloadBytes,
    });

    this.wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    this.startHeartbeat();

    logger.info({
      path: config.path,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      idleTimeoutMs: config.idleTimeoutMs,
      maxPayloadBytes: config.maxPayloadBytes,
      event: 'ws_acceptor_initialized'
    }, 'WebSocket acceptor initialized');
  }

  onConnection(handler: (connection: ClientConnection) => void): void {
    this.handler = handler;
  }

  get connectionCount(): number {
    return this.wss.clients.size;
  }

  close(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = undefined;
    }

    // Sessions were closed by the connection manager; anything left is unowned
    for (const ws of this.wss.clients) {
      ws.terminate();
    }

    return new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    // Prefer XFF (behind a proxy), fall back to the socket address
    const forwarded = req.headers['x-forwarded-for'];
    const forwardedFirst = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
    const remoteAddress = forwardedFirst || req.socket.remoteAddress;

    if (!this.handler) {
      logger.warn({ remoteAddress, event: 'ws_rejected_no_handler' }, 'WebSocket connection before broker attached');
      ws.close(1013, 'NOT_READY');
      return;
    }

    this.alive.set(ws, true);
    ws.on('pong', () => {
      this.alive.set(ws, true);
    });

    if (this.config.idleTimeoutMs > 0) {
      let idleTimer: NodeJS.Timeout | undefined;
      const armIdle = () => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = setTimeout(() => {
          const { code, reason } = getCloseParams(CloseSource.IDLE_TIMEOUT);
          logger.info({ remoteAddress, event: 'ws_idle_timeout' }, 'Closing idle WebSocket');
          ws.close(code, reason);
        }, this.config.idleTimeoutMs);
      };
      armIdle();
      ws.on('message', armIdle);
      ws.on('close', () => {
        if (idleTimer) clearTimeout(idleTimer);
      });
    }

    this.handler(new WsClientConnection(ws, remoteAddress, {
      inboundQueueMax: this.config.inboundQueueMax,
    }));
  }

  /**
   * Ping every socket; terminate the ones that missed the previous ping
   */
  private startHeartbeat(): void {
    if (this.config.heartbeatIntervalMs <= 0) {
      return;
    }

    this.heartbeatInterval = setInterval(() => {
      let activeCount = 0;
      let terminatedCount = 0;

      for (const ws of this.wss.clients) {
        if (this.alive.get(ws) === false) {
          ws.terminate();
          terminatedCount++;
          continue;
        }
        this.alive.set(ws, false);
        ws.ping();
        activeCount++;
      }

      if (terminatedCount > 0) {
        logger.info({
          terminated: terminatedCount,
          active: activeCount,
          event: 'ws_heartbeat_terminated'
        }, 'WebSocket heartbeat: terminated unresponsive connections');
      }
    }, this.config.heartbeatIntervalMs);

    // Non-blocking
    this.heartbeatInterval.unref();
  }
}
