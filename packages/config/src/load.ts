import { type RiskweaveConfig, riskweaveConfigSchema } from './schema.js';

/**
 * Parse fusion weights from FUSION_WEIGHTS env var (JSON object)
 */
function parseFusionWeights(env: NodeJS.ProcessEnv): unknown {
  const weightsJson = env.FUSION_WEIGHTS;
  if (!weightsJson) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(weightsJson);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('FUSION_WEIGHTS must be a JSON object');
    }
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error('FUSION_WEIGHTS is not valid JSON');
    }
    throw error;
  }
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws Error if validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RiskweaveConfig {
  const rawConfig = {
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
    fusion: {
      weights: parseFusionWeights(env),
      modelBlend: env.FUSION_MODEL_BLEND,
      modelPath: env.FUSION_MODEL_PATH || undefined,
    },
    graph: {
      textDomainTlds: env.GRAPH_TEXT_TLDS,
    },
    detection: {
      detectorTimeoutMs: env.DETECTOR_TIMEOUT_MS,
    },
    alerts: {
      capacity: env.ALERT_FEED_CAPACITY,
      minBand: env.ALERT_MIN_BAND,
    },
    webhook: {
      secret: env.WEBHOOK_SECRET || undefined,
      maxAgeSeconds: env.WEBHOOK_MAX_AGE_SECONDS,
    },
  };

  const result = riskweaveConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
