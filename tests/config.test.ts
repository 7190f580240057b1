import { describe, expect, it } from 'vitest';
import { loadConfig, toConfigProvider } from '../src/config/index.js';
import { normalizeLogLevel } from '../src/config/schema.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ PERPLEXITY_API_KEY: 'test-secret' });
    expect(config).toMatchObject({
      PERPLEXITY_DEFAULT_MODEL: 'sonar',
      PERPLEXITY_BASE_URL: 'https://api.perplexity.ai',
      REQUEST_TIMEOUT_SECONDS: 30,
      LOG_LEVEL: 'info',
      MCP_TRANSPORT: 'stdio',
      HTTP_HOST: '0.0.0.0',
      HTTP_PORT: 8080
    });
    expect(config.MCP_AUTH_TOKEN).toBeUndefined();
  });

  it('normalizes the log level case', () => {
    expect(loadConfig({ PERPLEXITY_API_KEY: 'test-secret', LOG_LEVEL: 'DEBUG' }).LOG_LEVEL).toBe('debug');
  });

  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow();
  });

  it('rejects an unknown default model', () => {
    expect(() => loadConfig({ PERPLEXITY_API_KEY: 'test-secret', PERPLEXITY_DEFAULT_MODEL: 'gpt-4' })).toThrow();
  });

  it('accepts warning as an alias of warn', () => {
    expect(loadConfig({ PERPLEXITY_API_KEY: 'test-secret', LOG_LEVEL: 'WARNING' }).LOG_LEVEL).toBe('warn');
  });

  it('falls back to info for an unknown log level', () => {
    expect(loadConfig({ PERPLEXITY_API_KEY: 'test-secret', LOG_LEVEL: 'verbose' }).LOG_LEVEL).toBe('info');
  });
});

describe('toConfigProvider', () => {
  it('exposes the search settings in milliseconds', () => {
    const config = loadConfig({
      PERPLEXITY_API_KEY: 'test-secret',
      PERPLEXITY_DEFAULT_MODEL: 'sonar-pro',
      REQUEST_TIMEOUT_SECONDS: '5'
    });
    expect(toConfigProvider(config)).toEqual({
      apiKey: 'test-secret',
      defaultModel: 'sonar-pro',
      requestTimeoutMs: 5000,
      logLevel: 'info'
    });
  });
});

describe('normalizeLogLevel', () => {
  it('trims and lowercases', () => {
    expect(normalizeLogLevel(' Error ')).toBe('error');
    expect(normalizeLogLevel('')).toBe('info');
  });
});
