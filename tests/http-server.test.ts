import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../src/app-context.js';
import { configSchema } from '../src/config/schema.js';
import { McpDispatcher } from '../src/mcp/dispatcher.js';
import { ToolRegistry } from '../src/mcp/registry.js';
import { makeNoopLogger } from '../src/observability/logger.js';
import { buildServer } from '../src/server/fastify.js';
import { tokenMatches } from '../src/server/middleware/auth.js';
import { fakeCapability } from './helpers.js';

const AUTH_TOKEN = 'test-token-123456';

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

async function server(env: Record<string, string> = {}): Promise<FastifyInstance> {
  const logger = makeNoopLogger();
  const registry = new ToolRegistry(logger, { requiredTools: [] });
  registry.register('echo', fakeCapability('echo'));
  const dispatcher = new McpDispatcher(registry, logger, { serverInfo: { name: 'test-server', version: '0.0.1' } });
  const ctx: AppContext = {
    config: configSchema.parse({ PERPLEXITY_API_KEY: 'test-secret', ...env }),
    logger,
    services: { registry, dispatcher }
  };
  app = await buildServer(ctx);
  return app;
}

function post(target: FastifyInstance, payload: string, headers: Record<string, string> = {}) {
  return target.inject({
    method: 'POST',
    url: '/mcp',
    payload,
    headers: { 'content-type': 'application/json', ...headers }
  });
}

describe('HTTP transport', () => {
  it('reports health', async () => {
    const response = await (await server()).inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', tools: 1 });
  });

  it('dispatches JSON-RPC requests', async () => {
    const response = await post(await server(), '{"jsonrpc":"2.0","id":1,"method":"tools/list"}');
    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toMatchObject({ jsonrpc: '2.0', id: 1, result: { tools: [{ name: 'echo' }] } });
  });

  it('answers malformed bodies with a parse error', async () => {
    const response = await post(await server(), '{"jsonrpc":');
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
  });

  it('accepts notifications without a body', async () => {
    const response = await post(await server(), '{"jsonrpc":"2.0","method":"notifications/initialized"}');
    expect(response.statusCode).toBe(202);
    expect(response.body).toBe('');
  });

  it('only allows POST on the endpoint', async () => {
    const response = await (await server()).inject({ method: 'GET', url: '/mcp' });
    expect(response.statusCode).toBe(405);
    expect(response.headers.allow).toBe('POST');
  });

  describe('with a bearer token configured', () => {
    const ping = '{"jsonrpc":"2.0","id":1,"method":"ping"}';

    it('rejects a missing token', async () => {
      const response = await post(await server({ MCP_AUTH_TOKEN: AUTH_TOKEN }), ping);
      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: 'Missing bearer token' });
    });

    it('rejects a wrong token', async () => {
      const response = await post(await server({ MCP_AUTH_TOKEN: AUTH_TOKEN }), ping, {
        authorization: 'Bearer wrong-token-000000'
      });
      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: 'Invalid token' });
    });

    it('accepts the configured token', async () => {
      const response = await post(await server({ MCP_AUTH_TOKEN: AUTH_TOKEN }), ping, {
        authorization: `Bearer ${AUTH_TOKEN}`
      });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ jsonrpc: '2.0', id: 1, result: {} });
    });

    it('leaves the health check open', async () => {
      const response = await (await server({ MCP_AUTH_TOKEN: AUTH_TOKEN })).inject({ method: 'GET', url: '/health' });
      expect(response.statusCode).toBe(200);
    });
  });

  it('compares tokens by value', () => {
    expect(tokenMatches(AUTH_TOKEN, AUTH_TOKEN)).toBe(true);
    expect(tokenMatches('short', AUTH_TOKEN)).toBe(false);
  });
});
