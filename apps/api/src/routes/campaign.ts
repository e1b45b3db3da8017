import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppRouteOptions } from '../lib/context.js';
import { SessionQuerySchema, validationError } from '../lib/validation.js';

/**
 * Register campaign status routes
 */
export async function campaignRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  /**
   * GET /campaign?session=<id>
   *
   * Current campaign report; reading never changes the graph
   */
  fastify.get('/campaign', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = SessionQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }
    const { session } = query.data;
    return reply.send({ session, ...ctx.sessions.view(session).correlate() });
  });

  /**
   * GET /campaign/graph?session=<id>
   */
  fastify.get('/campaign/graph', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = SessionQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }
    const { session } = query.data;
    return reply.send({ session, ...ctx.sessions.view(session).snapshot() });
  });

  /**
   * POST /campaign/reset?session=<id>
   */
  fastify.post('/campaign/reset', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = SessionQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }
    const { session } = query.data;
    const discardedSignals = ctx.sessions.reset(session);

    fastify.log.info({ session, discardedSignals }, 'Campaign session reset');
    return reply.send({ session, discardedSignals });
  });
}
