#!/usr/bin/env node
import { loadConfig, toConfigProvider } from './config/index.js';
import { errorMessage } from './domain/errors.js';
import { McpDispatcher } from './mcp/dispatcher.js';
import { ToolRegistry } from './mcp/registry.js';
import { makeLogger } from './observability/logger.js';
import { buildServer } from './server/fastify.js';
import { SearchTool } from './tools/search-tool.js';
import { StdioTransport } from './transports/stdio.js';
import { PerplexityClient } from './upstream/perplexity-client.js';
import type { AppContext } from './app-context.js';

const SERVER_INFO = { name: 'sonar-search-mcp', version: '1.0.0' };

async function main() {
  const config = loadConfig();
  const logger = makeLogger({
    level: config.LOG_LEVEL,
    destination: config.MCP_TRANSPORT === 'stdio' ? 2 : 1
  });

  const provider = toConfigProvider(config);
  const client = new PerplexityClient(provider, logger.child({ component: 'perplexity' }), {
    baseUrl: config.PERPLEXITY_BASE_URL
  });

  const registry = new ToolRegistry(logger.child({ component: 'registry' }), {
    defaultTimeoutMs: provider.requestTimeoutMs
  });
  const searchTool = new SearchTool(client, logger.child({ component: 'search-tool' }));
  registry.register(searchTool.name, searchTool);
  registry.start();

  const dispatcher = new McpDispatcher(registry, logger.child({ component: 'dispatcher' }), {
    defaultTimeoutMs: provider.requestTimeoutMs,
    serverInfo: SERVER_INFO
  });

  const ctx: AppContext = { config, logger, services: { registry, dispatcher } };

  if (config.MCP_TRANSPORT === 'stdio') {
    const transport = new StdioTransport(dispatcher, logger.child({ component: 'stdio' }));
    const stop = () => {
      logger.info('Shutting down');
      transport.close();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    logger.info({ transport: 'stdio' }, 'MCP server ready');
    await transport.start();
    logger.info('stdin closed, exiting');
    return;
  }

  const app = await buildServer(ctx);
  const address = await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
  logger.info({ transport: 'http', address }, 'MCP server listening');

  const shutdown = async () => {
    logger.info('Shutting down');
    await app.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
