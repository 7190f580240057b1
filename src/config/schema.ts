import { z } from 'zod';
import { DEFAULT_MODEL, SONAR_MODELS, isOneOf } from '../domain/search.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = { warning: 'warn' };

// Unknown levels fall back to info rather than failing boot.
export function normalizeLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  const resolved = LOG_LEVEL_ALIASES[level] ?? level;
  return isOneOf(LOG_LEVELS, resolved) ? resolved : 'info';
}

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PERPLEXITY_API_KEY: z.string().min(1, 'PERPLEXITY_API_KEY is required'),
  PERPLEXITY_DEFAULT_MODEL: z.enum(SONAR_MODELS).default(DEFAULT_MODEL),
  PERPLEXITY_BASE_URL: z.string().url().default('https://api.perplexity.ai'),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
  LOG_LEVEL: z.string().default('info').transform(normalizeLogLevel),
  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  HTTP_HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),
  MCP_AUTH_TOKEN: z.string().min(12).optional()
});

export type AppConfig = z.infer<typeof configSchema>;
