import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '../config/index.js';

export type { Logger } from 'pino';

const SENSITIVE_KEYS = ['apiKey', 'api_key', 'authorization', 'token', 'secret', 'password', 'cookie', 'session'];

export const REDACT_PATHS = [...SENSITIVE_KEYS, ...SENSITIVE_KEYS.map((key) => `*.${key}`)];

export interface LoggerOptions {
  level?: LogLevel;
  /** File descriptor for output. The stdio transport owns fd 1, so it logs to 2. */
  destination?: 1 | 2;
  bindings?: Record<string, unknown>;
  /** Overrides `destination`. */
  stream?: DestinationStream;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? 'info',
      base: { ...options.bindings, service: 'sonar-search-mcp' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' }
    },
    options.stream ?? pino.destination({ dest: options.destination ?? 1, sync: true })
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
