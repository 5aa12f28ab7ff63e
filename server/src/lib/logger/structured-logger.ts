/**
 * Structured Logger with Pino
 *
 * One root logger per process; services log through `componentLogger(name)`,
 * a child carrying `component` so messages stay free of name prefixes.
 * Console (JSON or pino-pretty) and an optional daily rotated file share the
 * same level and redaction paths.
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig, type LoggingConfig } from '../../config/logging.config.js';

export type Logger = pino.Logger;

const LOG_FILE_NAME = 'top-restaurants.log';

function openLogFile(config: LoggingConfig): rfs.RotatingFileStream {
  const logsDir = path.resolve(process.cwd(), config.dir);
  fs.mkdirSync(logsDir, { recursive: true });

  return rfs.createStream(LOG_FILE_NAME, {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

function buildStreams(config: LoggingConfig): pino.StreamEntry[] {
  // multistream entries take no 'silent'; the logger level still mutes them
  const level: pino.Level = config.level === 'silent' ? 'fatal' : config.level;
  const streams: pino.StreamEntry[] = [];

  if (config.console) {
    const stream = config.pretty
      ? pinoPretty({ colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' })
      : process.stdout;
    streams.push({ level, stream });
  }
  if (config.toFile) {
    streams.push({ level, stream: openLogFile(config) });
  }
  return streams;
}

/**
 * Build a logger from `config`. `destination` replaces the configured
 * console/file streams.
 */
export function createLogger(
  config: LoggingConfig = getLoggingConfig(),
  destination?: pino.DestinationStream
): Logger {
  return pino(
    {
      level: config.level,
      redact: { paths: config.redactFields, censor: '[REDACTED]' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.multistream(buildStreams(config))
  );
}

export const logger = createLogger();

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
