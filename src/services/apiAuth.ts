import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import crypto from 'crypto';

const headerString = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

function tokenMatches(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Guards `/internal/*` with a shared token. An empty token disables the check. */
export function registerApiAuth(app: FastifyInstance, apiToken: string): void {
  app.addHook('preHandler', async (req: FastifyRequest, reply: FastifyReply) => {
    if (!apiToken || !req.url.startsWith('/internal/')) return;

    const token = headerString(req.headers['x-api-token']) ?? headerString(req.headers.authorization) ?? '';
    const presented = token.startsWith('Bearer ') ? token.slice('Bearer '.length) : token;
    if (!tokenMatches(presented, apiToken)) {
      return reply.code(403).send({ error: 'forbidden' });
    }
  });
}
