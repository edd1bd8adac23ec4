/**
 * Broker Types
 * Core type definitions shared by the registry, sessions, dispatcher and transports
 */

import type { ProtocolErrorCode } from '../../lib/errors/broker-errors.js';

/**
 * Opaque resource identifier; identity is exact string equality
 */
export type ResourceUri = string;

/**
 * Assigned at accept time, unique for the lifetime of the process
 */
export type SessionId = string;

/**
 * Frame encoding a session speaks
 */
export type FrameDialect = 'v1' | 'legacy';

export interface InvalidationEvent {
  uri: ResourceUri;
  payload?: string;
}

export type OutboundMessage =
  | { type: 'invalidated'; uri: ResourceUri; payload?: string }
  | { type: 'ack'; uri: ResourceUri }
  | { type: 'error'; code: ProtocolErrorCode; reason: string };

export type ClientCommand =
  | { kind: 'subscribe'; uri: ResourceUri }
  | { kind: 'unsubscribe'; uri: ResourceUri }
  | { kind: 'close' };

/**
 * One client connection, independent of the socket library underneath
 */
export interface ClientConnection {
  readonly remoteAddress: string | undefined;

  /**
   * Next inbound text frame; null once the peer has closed.
   * Rejects with a TransportError when the transport fails.
   */
  receive(): Promise<string | null>;

  send(frame: string): Promise<void>;

  close(code: number, reason: string): void;
}

/**
 * Source of new client connections (WebSocket server, in-memory test harness, ...)
 */
export interface ConnectionAcceptor {
  onConnection(handler: (connection: ClientConnection) => void): void;
  close(): Promise<void>;
}

export type OverflowPolicy = 'drop_oldest' | 'disconnect';
