import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppRouteOptions } from '../lib/context.js';

interface HealthResponse {
  status: 'ok';
  timestamp: string;
  version: string;
  uptime: number;
  scorer: string;
  sessions: number;
}

/**
 * Register health check routes
 */
export async function healthRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  /**
   * GET /health
   *
   * Liveness probe - returns 200 if the service is running
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      uptime: Math.floor((Date.now() - ctx.startedAt) / 1000),
      scorer: ctx.orchestrator.fusion.scorerKind,
      sessions: ctx.sessions.ids().length,
    };

    return reply.send(response);
  });
}
