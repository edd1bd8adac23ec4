/**
 * WebSocket Client Connection
 * Adapts a `ws` socket to the broker's ClientConnection contract: inbound frames are
 * buffered in a bounded queue and read one at a time by the session's receive loop.
 */

import { WebSocket, type RawData } from 'ws';
import { BoundedQueue } from '../../lib/concurrency/bounded-queue.js';
import { TransportError } from '../../lib/errors/broker-errors.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { ClientConnection } from '../../services/broker/broker.types.js';
import { CloseSource, getCloseParams } from '../../services/broker/close-reasons.js';

export interface WsClientConnectionOptions {
  inboundQueueMax: number;
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export class WsClientConnection implements ClientConnection {
  private readonly inbound: BoundedQueue<string>;

  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string | undefined,
    options: WsClientConnectionOptions
  ) {
    this.inbound = new BoundedQueue<string>(options.inboundQueueMax, 'reject');

    ws.on('message', (data, isBinary) => {
      // The protocol is text-only; binary frames are dropped unanswered
      if (isBinary) {
        logger.debug({ remoteAddress, event: 'ws_binary_ignored' }, 'Ignoring binary frame');
        return;
      }

      if (this.inbound.offer(rawDataToString(data)) === 'rejected') {
        logger.warn({
          remoteAddress,
          queued: this.inbound.size,
          event: 'ws_inbound_flood'
        }, 'Inbound frame queue overflow, closing connection');
        this.inbound.fail(new TransportError('Inbound frame queue overflow'));
        const { code, reason } = getCloseParams(CloseSource.INBOUND_FLOOD);
        this.close(code, reason);
      }
    });

    ws.on('close', () => {
      this.inbound.close();
    });

    ws.on('error', (err) => {
      this.inbound.fail(new TransportError(`WebSocket error: ${err.message}`, { cause: err }));
    });
  }

  receive(): Promise<string | null> {
    return this.inbound.take();
  }

  send(frame: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      this.ws.send(frame, (err) => {
        if (err) {
          reject(new TransportError(`WebSocket send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Starts the close handshake and ends receive() at once; the session does not wait
   * for the peer to answer.
   */
  close(code: number, reason: string): void {
    if (this.ws.readyState !== WebSocket.CLOSING && this.ws.readyState !== WebSocket.CLOSED) {
      this.ws.close(code, reason);
    }
    this.inbound.close();
  }
}
