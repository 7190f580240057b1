import { createHash, timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppContext } from '../../app-context.js';

function getBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (!scheme || !token) return null;
  if (scheme.toLowerCase() !== 'bearer') return null;
  return token;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function tokenMatches(candidate: string, expected: string): boolean {
  return timingSafeEqual(digest(candidate), digest(expected));
}

/**
 * Static bearer token on /mcp, enforced only when MCP_AUTH_TOKEN is configured.
 */
export const authPlugin = fp<{ ctx: AppContext }>(async (fastify, opts) => {
  const expected = opts.ctx.config.MCP_AUTH_TOKEN;
  if (!expected) return;

  fastify.addHook('preHandler', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.url.startsWith('/mcp')) return;

    const token = getBearerToken(request);
    if (!token) {
      opts.ctx.logger.warn({ url: request.url }, 'Missing bearer token');
      return reply.code(401).send({ error: 'Missing bearer token' });
    }

    if (!tokenMatches(token, expected)) {
      opts.ctx.logger.warn({ url: request.url }, 'Invalid bearer token');
      return reply.code(401).send({ error: 'Invalid token' });
    }
  });
});
