/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import type { LevelWithSilent } from 'pino';

export interface LoggingConfig {
  level: LevelWithSilent;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(raw: string | undefined, nodeEnv: string | undefined): LevelWithSilent {
  const match = LEVELS.find(level => level === raw);
  if (match) return match;
  // node:test runs set NODE_ENV=test; keep the reporter output readable
  return nodeEnv === 'test' ? 'silent' : 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV === 'development' || env.NODE_ENV === undefined;

  return {
    level: resolveLevel(env.LOG_LEVEL, env.NODE_ENV),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,token,ingestToken,password,secret,req.headers.authorization')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
