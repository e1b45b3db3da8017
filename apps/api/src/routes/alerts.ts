import { RiskBandEnum } from '@riskweave/core';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { MAX_ALERT_CAPACITY } from '../lib/alertFeed.js';
import type { AppRouteOptions } from '../lib/context.js';
import { validationError } from '../lib/validation.js';

const AlertBodySchema = z.object({
  title: z.string().min(1).max(200),
  message: z.string().max(2000).optional(),
  riskBand: RiskBandEnum,
  source: z.string().min(1).max(64).default('manual'),
  session: z.string().max(64).optional(),
  signalId: z.string().max(64).optional(),
  unifiedRiskScore: z.number().min(0).max(100).optional(),
  metadata: z.record(z.unknown()).optional(),
});

const AlertQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_ALERT_CAPACITY).default(50),
});

/**
 * Register alert feed routes
 */
export async function alertRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  /**
   * POST /alerts
   */
  fastify.post('/alerts', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = AlertBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.status(400).send(validationError(body.error));
    }
    return reply.status(201).send(ctx.alerts.push(body.data));
  });

  /**
   * GET /alerts?limit=<n>
   *
   * Most recent first
   */
  fastify.get('/alerts', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = AlertQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }
    return reply.send({
      alerts: ctx.alerts.list(query.data.limit),
      total: ctx.alerts.size,
      capacity: ctx.alerts.capacity,
    });
  });
}
