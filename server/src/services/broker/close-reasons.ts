/**
 * Session Close Codes and Reasons
 * Centralized taxonomy for every session teardown
 *
 * Standard WebSocket close codes:
 * - 1000: Normal closure
 * - 1001: Going away (server shutdown, idle timeout)
 * - 1008: Policy violation
 * - 1011: Unexpected condition (errors)
 */

/**
 * Tags every close with its originating cause
 */
export enum CloseSource {
  CLIENT_CLOSE = 'CLIENT_CLOSE',           // Peer closed or sent a close frame
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',     // Socket failed while reading or writing
  SLOW_CONSUMER = 'SLOW_CONSUMER',         // Outbound queue overflowed under the disconnect policy
  INBOUND_FLOOD = 'INBOUND_FLOOD',         // Client sent frames faster than they could be processed
  IDLE_TIMEOUT = 'IDLE_TIMEOUT',           // No frames for the configured idle period
  SERVER_SHUTDOWN = 'SERVER_SHUTDOWN',     // Graceful broker shutdown
}

export interface CloseParams {
  code: number;
  reason: string;
}

export function getCloseParams(closeSource: CloseSource): CloseParams {
  switch (closeSource) {
    case CloseSource.CLIENT_CLOSE:
      return { code: 1000, reason: 'CLIENT_CLOSE' };
    case CloseSource.TRANSPORT_ERROR:
      return { code: 1011, reason: 'TRANSPORT_ERROR' };
    case CloseSource.SLOW_CONSUMER:
      return { code: 1008, reason: 'SLOW_CONSUMER' };
    case CloseSource.INBOUND_FLOOD:
      return { code: 1008, reason: 'INBOUND_FLOOD' };
    case CloseSource.IDLE_TIMEOUT:
      return { code: 1001, reason: 'IDLE_TIMEOUT' };
    case CloseSource.SERVER_SHUTDOWN:
      return { code: 1001, reason: 'SERVER_SHUTDOWN' };
  }
}
