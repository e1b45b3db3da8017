import Fastify, { type FastifyInstance } from 'fastify';
import { parseCsvList, type RiskweaveConfig } from '@riskweave/config';
import type { LinearRiskModel } from '@riskweave/core';
import { createDetectionPipeline, loadRiskModelFile } from '@riskweave/detectors';
import { AlertFeed } from './lib/alertFeed.js';
import { getConfig } from './lib/config.js';
import type { AppContext } from './lib/context.js';
import { loggerOptions, toLogFn } from './lib/logger.js';
import { SessionRegistry } from './lib/sessions.js';
import { alertRoutes } from './routes/alerts.js';
import { analyzeRoutes } from './routes/analyze.js';
import { campaignRoutes } from './routes/campaign.js';
import { detectRoutes } from './routes/detect.js';
import { healthRoutes } from './routes/health.js';
import { ingestRoutes } from './routes/ingest.js';

export interface BuildServerOptions {
  /** Defaults to configuration loaded from the environment */
  config?: RiskweaveConfig;

  /** Set false to silence request logging */
  logger?: boolean;

  now?: () => Date;
}

/**
 * Build and configure the Fastify server
 */
export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();

  const server = Fastify({
    logger: options.logger === false ? false : loggerOptions(config.logging.level, config.logging.format),
  });

  let model: LinearRiskModel | undefined;
  if (config.fusion.modelPath) {
    try {
      model = await loadRiskModelFile(config.fusion.modelPath);
      server.log.info({ modelId: model.id }, 'Trained risk model loaded');
    } catch (error) {
      server.log.warn(
        { path: config.fusion.modelPath, error: error instanceof Error ? error.message : String(error) },
        'Trained risk model unavailable, using weighted average',
      );
    }
  }

  const ctx: AppContext = {
    config,
    orchestrator: createDetectionPipeline({
      weights: config.fusion.weights,
      model,
      modelBlend: config.fusion.modelBlend,
      detectorTimeoutMs: config.detection.detectorTimeoutMs,
      now: options.now,
      onLog: toLogFn(server.log.child({ component: 'detection' })),
    }),
    sessions: new SessionRegistry({
      textDomainTlds: parseCsvList(config.graph.textDomainTlds),
      now: options.now,
      onLog: toLogFn(server.log.child({ component: 'correlation' })),
    }),
    alerts: new AlertFeed(config.alerts.capacity, options.now),
    startedAt: Date.now(),
  };

  server.setErrorHandler((error, request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, 'Request failed');
    return reply.status(500).send({ error: 'Internal server error' });
  });

  await server.register(healthRoutes, { ctx });
  await server.register(detectRoutes, { ctx });
  await server.register(analyzeRoutes, { ctx });
  await server.register(campaignRoutes, { ctx });
  await server.register(alertRoutes, { ctx });
  await server.register(ingestRoutes, { ctx });

  return server;
}
