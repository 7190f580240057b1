import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../app-context.js';
import { background, withCancel } from '../../util/context.js';

export async function registerMcpRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { dispatcher } = ctx.services;

  app.post('/mcp', async (request, reply) => {
    const body = typeof request.body === 'string' ? request.body : JSON.stringify(request.body ?? null);

    const call = withCancel(background());
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) call.cancel();
    });

    const outcome = await dispatcher.dispatch(call.ctx, body);
    if (outcome.notification) {
      return reply.code(202).send();
    }

    return reply.code(200).header('content-type', 'application/json; charset=utf-8').send(outcome.body);
  });

  app.get('/mcp', async (_request, reply) => {
    return reply.code(405).header('allow', 'POST').send({ error: 'Method Not Allowed' });
  });
}
