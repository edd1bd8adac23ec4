/**
 * Legacy Frame Adapter
 * The first generation of clients spoke `{"message": ..., "data": {"uri": ...}}` frames:
 *   watch / unwatch        (client -> server)
 *   invalidate             (server -> client)
 * Sessions that send a legacy frame are answered in the same dialect.
 */

import { z } from 'zod';
import { ProtocolError } from '../../../lib/errors/broker-errors.js';
import type { ClientCommand, OutboundMessage } from '../broker.types.js';
import { ResourceUriSchema } from './resource-uri.js';

const LegacyClientFrameSchema = z.object({
  message: z.enum(['watch', 'unwatch']),
  data: z.object({ uri: ResourceUriSchema }),
});

/**
 * A legacy frame carries `message` and no `type`
 */
export function isLegacyFrame(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'message' in value && !('type' in value);
}

export function normalizeLegacyFrame(value: unknown): ClientCommand | ProtocolError {
  const result = LegacyClientFrameSchema.safeParse(value);
  if (!result.success) {
    return new ProtocolError('invalid_frame', formatIssue(result.error));
  }

  const { message, data } = result.data;
  return message === 'watch'
    ? { kind: 'subscribe', uri: data.uri }
    : { kind: 'unsubscribe', uri: data.uri };
}

export function encodeLegacyFrame(message: OutboundMessage): string {
  switch (message.type) {
    case 'invalidated':
      return JSON.stringify({
        message: 'invalidate',
        data: message.payload === undefined
          ? { uri: message.uri }
          : { uri: message.uri, payload: message.payload },
      });
    case 'ack':
      return JSON.stringify({ message: 'ack', data: { uri: message.uri } });
    case 'error':
      return JSON.stringify({ message: 'error', data: { code: message.code, reason: message.reason } });
  }
}

export function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid frame';
  const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return `${where}${issue.message}`;
}
