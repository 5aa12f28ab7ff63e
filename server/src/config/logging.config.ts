/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevelName[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

function parseLevel(value: string | undefined): LogLevelName {
  const level = LOG_LEVELS.find(l => l === value);
  return level ?? 'info';
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    level: parseLevel(env.LOG_LEVEL),
    pretty: env.LOG_PRETTY === 'true',
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorizationToken,token,password,apiKey,secret,headers.authorizationToken')
      .split(',').map(f => f.trim()),
  };
}
