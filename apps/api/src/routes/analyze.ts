import { AttachmentSchema, type SignalInput } from '@riskweave/core';
import { DETECTOR_IDS } from '@riskweave/detectors';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AppRouteOptions } from '../lib/context.js';
import { validationError } from '../lib/validation.js';

const TextBodySchema = z.object({
  text: z.string().min(1),
  subject: z.string().optional(),
});

const UrlBodySchema = z.object({
  url: z.string().min(1),
});

const AttachmentBodySchema = z.object({
  attachment: AttachmentSchema,
});

interface AnalyzeRoute<T> {
  path: string;
  detectorId: string;
  schema: z.ZodType<T>;
  toSignal: (body: T) => SignalInput;
}

function textSignal(body: z.infer<typeof TextBodySchema>): SignalInput {
  return { emailText: body.text, emailSubject: body.subject };
}

/**
 * Register single-detector analysis routes. None of them touch campaign state.
 */
export async function analyzeRoutes(fastify: FastifyInstance, { ctx }: AppRouteOptions): Promise<void> {
  function register<T>(route: AnalyzeRoute<T>): void {
    fastify.post(route.path, async (request: FastifyRequest, reply: FastifyReply) => {
      const body = route.schema.safeParse(request.body ?? {});
      if (!body.success) {
        return reply.status(400).send(validationError(body.error));
      }

      const output = await ctx.orchestrator.runDetector(route.detectorId, route.toSignal(body.data));
      return reply.send({ detectorId: route.detectorId, scores: output.scores, details: output.details });
    });
  }

  register({ path: '/analyze/email', detectorId: DETECTOR_IDS.emailPhishing, schema: TextBodySchema, toSignal: textSignal });
  register({
    path: '/analyze/credentials',
    detectorId: DETECTOR_IDS.credentials,
    schema: TextBodySchema,
    toSignal: textSignal,
  });
  register({ path: '/analyze/injection', detectorId: DETECTOR_IDS.injection, schema: TextBodySchema, toSignal: textSignal });
  register({ path: '/analyze/url', detectorId: DETECTOR_IDS.url, schema: UrlBodySchema, toSignal: (body) => body });
  register({
    path: '/analyze/attachment',
    detectorId: DETECTOR_IDS.malware,
    schema: AttachmentBodySchema,
    toSignal: (body) => body,
  });
}
