import { config as loadDotEnv } from 'dotenv';
import type { SonarModel } from '../domain/search.js';
import { configSchema, type AppConfig, type LogLevel } from './schema.js';

export type { AppConfig, LogLevel } from './schema.js';

/**
 * The subset of configuration the search path reads.
 */
export interface ConfigProvider {
  readonly apiKey: string;
  readonly defaultModel: SonarModel;
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  loadDotEnv({ quiet: true });
  return configSchema.parse(env);
}

export function toConfigProvider(config: AppConfig): ConfigProvider {
  return {
    apiKey: config.PERPLEXITY_API_KEY,
    defaultModel: config.PERPLEXITY_DEFAULT_MODEL,
    requestTimeoutMs: config.REQUEST_TIMEOUT_SECONDS * 1000,
    logLevel: config.LOG_LEVEL
  };
}
