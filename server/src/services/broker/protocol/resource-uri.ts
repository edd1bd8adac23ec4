import { z } from 'zod';

export const MAX_URI_LENGTH = 2048;

export const ResourceUriSchema = z
  .string()
  .min(1, 'uri must not be empty')
  .max(MAX_URI_LENGTH, `uri must be at most ${MAX_URI_LENGTH} characters`);

export function isResourceUri(value: unknown): value is string {
  return ResourceUriSchema.safeParse(value).success;
}
