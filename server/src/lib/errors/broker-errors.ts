/**
 * Broker Error Taxonomy
 *
 * ProtocolError         - malformed client frame; reported with an error frame, session stays open
 * TransportError        - connection broken; session torn down, no retry
 * BackendUnavailableError - ingest refused (broker stopping or stopped)
 * OverflowError         - slow consumer; handled by the outbound queue policy, only ever logged
 * InvalidChangeError    - ingest request that does not describe a change
 */

export type ProtocolErrorCode =
  | 'parse_error'
  | 'invalid_frame'
  | 'unsupported_version'
  | 'rate_limited'
  | 'subscription_limit'
  | 'legacy_rejected';

export abstract class BrokerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProtocolError extends BrokerError {
  constructor(
    readonly code: ProtocolErrorCode,
    message: string
  ) {
    super(message);
  }
}

export class TransportError extends BrokerError {
  readonly code = 'TRANSPORT_ERROR';
}

export class BackendUnavailableError extends BrokerError {
  readonly code = 'BACKEND_UNAVAILABLE';
}

export class OverflowError extends BrokerError {
  readonly code = 'OVERFLOW';

  constructor(
    readonly sessionId: string,
    readonly capacity: number,
    readonly policy: 'drop_oldest' | 'disconnect'
  ) {
    super(`Outbound queue of session ${sessionId} is full (capacity ${capacity}, policy ${policy})`);
  }
}

export class InvalidChangeError extends BrokerError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly details?: unknown) {
    super(message);
  }
}

export class ConfigError extends BrokerError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * Error message for logs, never throws
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
