/**
 * Environment Configuration
 * Reads process.env once (after dotenv) and validates it; fail fast on misconfiguration.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../lib/errors/broker-errors.js';
import type { OverflowPolicy } from '../services/broker/broker.types.js';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const intSetting = (defaultValue: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue));

const flagSetting = (defaultValue: boolean) =>
  z.preprocess(emptyAsUndefined, z.enum(['true', 'false']).default(defaultValue ? 'true' : 'false'))
    .transform((value) => value === 'true');

const optionalString = z.preprocess(emptyAsUndefined, z.string().min(1).optional());

const EnvSchema = z.object({
  NODE_ENV: z.preprocess(emptyAsUndefined, z.enum(['development', 'production', 'test']).default('development')),
  PORT: intSetting(4691, 0, 65535),
  HOST: z.preprocess(emptyAsUndefined, z.string().default('0.0.0.0')),
  WS_PATH: z.preprocess(emptyAsUndefined, z.string().startsWith('/').default('/ws')),
  WS_MAX_PAYLOAD_BYTES: intSetting(64 * 1024, 256),
  WS_ALLOW_LEGACY: flagSetting(true),
  HEARTBEAT_INTERVAL_MS: intSetting(30_000, 0),
  IDLE_TIMEOUT_MS: intSetting(15 * 60 * 1000, 0),
  OUTBOUND_QUEUE_MAX: intSetting(256, 1),
  INBOUND_QUEUE_MAX: intSetting(128, 1),
  OVERFLOW_POLICY: z.preprocess(emptyAsUndefined, z.enum(['drop_oldest', 'disconnect']).default('drop_oldest')),
  MAX_SUBSCRIPTIONS_PER_SESSION: intSetting(1000, 1),
  SUBSCRIBE_RATE_MAX: intSetting(100, 1),
  SUBSCRIBE_RATE_PER_SEC: intSetting(20, 1),
  COALESCE_WINDOW_MS: intSetting(0, 0),
  INGEST_TOKEN: optionalString,
  INGEST_BODY_LIMIT: z.preprocess(emptyAsUndefined, z.string().default('1mb')),
  REDIS_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  CHANGE_FEED_CHANNEL: z.preprocess(emptyAsUndefined, z.string().min(1).default('invalidations')),
});

export interface BrokerConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  ws: {
    path: string;
    maxPayloadBytes: number;
    allowLegacy: boolean;
    heartbeatIntervalMs: number;
    idleTimeoutMs: number;
    inboundQueueMax: number;
  };
  sessions: {
    outboundQueueMax: number;
    overflowPolicy: OverflowPolicy;
    maxSubscriptionsPerSession: number;
    subscribeRateMax: number;
    subscribeRatePerSec: number;
  };
  ingest: {
    coalesceWindowMs: number;
    token: string | undefined;
    bodyLimit: string;
  };
  redis: {
    url: string | undefined;
    channel: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = result.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    ws: {
      path: e.WS_PATH,
      maxPayloadBytes: e.WS_MAX_PAYLOAD_BYTES,
      allowLegacy: e.WS_ALLOW_LEGACY,
      heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
      idleTimeoutMs: e.IDLE_TIMEOUT_MS,
      inboundQueueMax: e.INBOUND_QUEUE_MAX,
    },
    sessions: {
      outboundQueueMax: e.OUTBOUND_QUEUE_MAX,
      overflowPolicy: e.OVERFLOW_POLICY,
      maxSubscriptionsPerSession: e.MAX_SUBSCRIPTIONS_PER_SESSION,
      subscribeRateMax: e.SUBSCRIBE_RATE_MAX,
      subscribeRatePerSec: e.SUBSCRIBE_RATE_PER_SEC,
    },
    ingest: {
      coalesceWindowMs: e.COALESCE_WINDOW_MS,
      token: e.INGEST_TOKEN,
      bodyLimit: e.INGEST_BODY_LIMIT,
    },
    redis: {
      url: e.REDIS_URL,
      channel: e.CHANGE_FEED_CHANNEL,
    },
  };
}

let cached: Readonly<BrokerConfig> | null = null;

export function getConfig(): Readonly<BrokerConfig> {
  if (!cached) {
    cached = Object.freeze(loadConfig());
  }
  return cached;
}
