/**
 * Client Frame Protocol (v1)
 *
 * Every WebSocket text message carries exactly one JSON object.
 *
 * Client -> server
 *   {"v":1,"type":"subscribe","uri":"/orders/42"}
 *   {"v":1,"type":"unsubscribe","uri":"/orders/42"}
 *   {"v":1,"type":"close"}
 *
 * Server -> client
 *   {"v":1,"type":"ack","uri":"/orders/42"}
 *   {"v":1,"type":"invalidated","uri":"/orders/42","payload":"..."}   payload optional
 *   {"v":1,"type":"error","code":"invalid_frame","reason":"..."}
 */

import { z } from 'zod';
import { ProtocolError } from '../../../lib/errors/broker-errors.js';
import type { ClientCommand, FrameDialect, OutboundMessage } from '../broker.types.js';
import { ResourceUriSchema } from './resource-uri.js';
import { encodeLegacyFrame, formatIssue, isLegacyFrame, normalizeLegacyFrame } from './legacy-frames.js';

export const PROTOCOL_VERSION = 1;

const ClientFrameSchema = z.discriminatedUnion('type', [
  z.object({ v: z.literal(PROTOCOL_VERSION), type: z.literal('subscribe'), uri: ResourceUriSchema }),
  z.object({ v: z.literal(PROTOCOL_VERSION), type: z.literal('unsubscribe'), uri: ResourceUriSchema }),
  z.object({ v: z.literal(PROTOCOL_VERSION), type: z.literal('close') }),
]);

export type DecodeResult =
  | { ok: true; command: ClientCommand; dialect: FrameDialect }
  | { ok: false; error: ProtocolError };

export interface DecodeOptions {
  allowLegacy: boolean;
}

export function decodeClientFrame(raw: string, options: DecodeOptions): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: new ProtocolError('parse_error', 'Frame is not valid JSON') };
  }

  if (isLegacyFrame(parsed)) {
    if (!options.allowLegacy) {
      return {
        ok: false,
        error: new ProtocolError('legacy_rejected', `Legacy frames are disabled; send protocol v${PROTOCOL_VERSION} frames`),
      };
    }
    const command = normalizeLegacyFrame(parsed);
    return command instanceof ProtocolError
      ? { ok: false, error: command }
      : { ok: true, command, dialect: 'legacy' };
  }

  if (typeof parsed === 'object' && parsed !== null && 'v' in parsed && parsed.v !== PROTOCOL_VERSION) {
    return {
      ok: false,
      error: new ProtocolError('unsupported_version', `Unsupported protocol version ${String(parsed.v)}`),
    };
  }

  const result = ClientFrameSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: new ProtocolError('invalid_frame', formatIssue(result.error)) };
  }

  const frame = result.data;
  switch (frame.type) {
    case 'subscribe':
      return { ok: true, command: { kind: 'subscribe', uri: frame.uri }, dialect: 'v1' };
    case 'unsubscribe':
      return { ok: true, command: { kind: 'unsubscribe', uri: frame.uri }, dialect: 'v1' };
    case 'close':
      return { ok: true, command: { kind: 'close' }, dialect: 'v1' };
  }
}

export function encodeServerFrame(message: OutboundMessage, dialect: FrameDialect): string {
  if (dialect === 'legacy') {
    return encodeLegacyFrame(message);
  }
  return JSON.stringify({ v: PROTOCOL_VERSION, ...message });
}
