/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Optional daily rotated log file
 * - Pretty console output in development
 * - Automatic secret redaction
 */

import pino, { type Logger as PinoLogger } from 'pino';
import { createStream, type RotatingFileStream } from 'rotating-file-stream';
import { PinoPretty } from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

let fileStream: RotatingFileStream | undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = createStream('broker.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const streams: pino.StreamEntry[] = [];
if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}
if (fileStream) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: fileStream,
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = PinoLogger;
