import Fastify from 'fastify';
import { authPlugin } from './middleware/auth.js';
import { registerMcpRoutes } from './routes/mcp.js';
import type { AppContext } from '../app-context.js';

export async function buildServer(ctx: AppContext) {
  const app = Fastify({
    logger: false
  });

  // The dispatcher owns JSON parsing so malformed bodies get a JSON-RPC parse error.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.get('/health', async () => ({
    status: 'ok',
    uptime: process.uptime(),
    tools: ctx.services.registry.size
  }));

  await app.register(authPlugin, { ctx });
  await registerMcpRoutes(app, ctx);

  return app;
}
