import { SignalInputSchema } from '@riskweave/core';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { detectAndAlert, type AppRouteOptions } from '../lib/context.js';
import { SessionQuerySchema, validationError } from '../lib/validation.js';

/**
 * Register the full detection route
 */
export async function detectRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  /**
   * POST /detect?session=<id>
   *
   * Runs every applicable detector, fuses, correlates within the session and
   * explains. Verdicts at or above ALERT_MIN_BAND are pushed to the alert feed.
   */
  fastify.post('/detect', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = SessionQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }
    const body = SignalInputSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.status(400).send(validationError(body.error));
    }

    const verdict = await detectAndAlert(ctx, body.data, query.data.session, 'detect');

    fastify.log.info(
      {
        session: query.data.session,
        signalId: verdict.signalId,
        unifiedRiskScore: verdict.unifiedRiskScore,
        riskBand: verdict.riskBand,
        detectorErrors: verdict.detectorErrors.length,
      },
      'Detection completed',
    );

    return reply.send(verdict);
  });
}
