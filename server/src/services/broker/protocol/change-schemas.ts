/**
 * Backend change request shapes, shared by the HTTP and Redis ingest transports
 *
 *   {"uri": "/orders/42", "payload": "..."}
 *   {"changes": [{"uri": "/orders/42"}, {"uri": "/orders/43"}]}
 *   {"message": "update", "data": {"uri": "/orders/42"}}     first-generation backends
 */

import { z } from 'zod';
import { InvalidChangeError } from '../../../lib/errors/broker-errors.js';
import type { InvalidationEvent } from '../broker.types.js';
import { ResourceUriSchema } from './resource-uri.js';
import { formatIssue } from './legacy-frames.js';

export const MAX_PAYLOAD_LENGTH = 64 * 1024;
export const MAX_BATCH_SIZE = 1000;

const ChangeSchema = z.object({
  uri: ResourceUriSchema,
  payload: z.string().max(MAX_PAYLOAD_LENGTH).optional(),
});

const ChangeBatchSchema = z.object({
  changes: z.array(ChangeSchema).min(1).max(MAX_BATCH_SIZE),
});

const LegacyUpdateSchema = z.object({
  message: z.literal('update'),
  data: z.object({ uri: ResourceUriSchema }),
});

export type ChangeParseResult =
  | { ok: true; changes: InvalidationEvent[] }
  | { ok: false; error: InvalidChangeError };

function invalid(error: z.ZodError): ChangeParseResult {
  return { ok: false, error: new InvalidChangeError(formatIssue(error), error.issues) };
}

function toEvent(change: z.infer<typeof ChangeSchema>): InvalidationEvent {
  return change.payload === undefined ? { uri: change.uri } : { uri: change.uri, payload: change.payload };
}

export function parseChangeRequest(body: unknown): ChangeParseResult {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { ok: false, error: new InvalidChangeError('Change request must be a JSON object') };
  }

  if ('changes' in body) {
    const result = ChangeBatchSchema.safeParse(body);
    return result.success ? { ok: true, changes: result.data.changes.map(toEvent) } : invalid(result.error);
  }

  if ('message' in body) {
    const result = LegacyUpdateSchema.safeParse(body);
    return result.success ? { ok: true, changes: [{ uri: result.data.data.uri }] } : invalid(result.error);
  }

  const result = ChangeSchema.safeParse(body);
  return result.success ? { ok: true, changes: [toEvent(result.data)] } : invalid(result.error);
}

/**
 * Parse a raw text message (Redis channel, raw socket line)
 */
export function parseChangeMessage(raw: string): ChangeParseResult {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return { ok: false, error: new InvalidChangeError('Change message is not valid JSON') };
  }
  return parseChangeRequest(body);
}
