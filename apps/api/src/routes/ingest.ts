import { SIGNATURE_HEADER, parseWebhookPayload, verifySignature } from '@riskweave/webhook';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { detectAndAlert, type AppRouteOptions } from '../lib/context.js';
import { SessionQuerySchema, validationError } from '../lib/validation.js';

/**
 * Register signed webhook ingestion
 *
 * JSON bodies are kept as raw strings in this plugin so the HMAC is computed
 * over the exact bytes the sender signed.
 */
export async function ingestRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * POST /ingest/webhook?session=<id>
   */
  fastify.post('/ingest/webhook', async (request: FastifyRequest, reply: FastifyReply) => {
    const secret = ctx.config.webhook.secret;
    if (!secret) {
      return reply.status(503).send({ error: 'Webhook ingestion is disabled' });
    }

    const header = request.headers[SIGNATURE_HEADER];
    if (typeof header !== 'string') {
      return reply.status(401).send({ error: 'Missing signature header' });
    }

    const raw = typeof request.body === 'string' ? request.body : '';
    const verification = verifySignature(raw, header, secret, { maxAgeSeconds: ctx.config.webhook.maxAgeSeconds });
    if (!verification.valid) {
      fastify.log.warn({ error: verification.error }, 'Webhook signature rejected');
      return reply.status(401).send({ error: verification.error });
    }

    const query = SessionQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send(validationError(query.error, 'query'));
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (error) {
      return reply.status(400).send({ error: `Body is not valid JSON: ${error instanceof Error ? error.message : String(error)}` });
    }

    const payload = parseWebhookPayload(body);
    if (!payload.success) {
      return reply.status(400).send(validationError(payload.error, 'webhook payload'));
    }

    const verdict = await detectAndAlert(ctx, payload.signal, query.data.session, 'webhook');
    return reply.send(verdict);
  });
}
