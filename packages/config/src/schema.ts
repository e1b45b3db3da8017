import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

export const riskBandSchema = z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);
export type RiskBandName = z.infer<typeof riskBandSchema>;

/**
 * API server configuration
 */
export const apiConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
});
export type ApiConfig = z.infer<typeof apiConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

export const DEFAULT_FUSION_WEIGHTS = {
  credential_score: 0.3,
  ai_text_score: 0.2,
  malware_score: 0.25,
  email_phishing_score: 0.15,
  url_score: 0.07,
  injection_score: 0.03,
} as const;

const weight = z.coerce.number().min(0).max(1);

/**
 * Weight table over the canonical score keys. Must sum to 1.
 */
export const fusionWeightsSchema = z
  .object({
    credential_score: weight,
    ai_text_score: weight,
    malware_score: weight,
    email_phishing_score: weight,
    url_score: weight,
    injection_score: weight,
  })
  .strict()
  .refine(
    (weights) => Math.abs(Object.values(weights).reduce((sum, w) => sum + w, 0) - 1) <= 1e-6,
    { message: 'fusion weights must sum to 1' },
  );
export type FusionWeightsConfig = z.infer<typeof fusionWeightsSchema>;

/**
 * Fusion configuration
 */
export const fusionConfigSchema = z.object({
  weights: fusionWeightsSchema.default(DEFAULT_FUSION_WEIGHTS),

  /** Share of the trained model prediction in the blended score */
  modelBlend: z.coerce.number().min(0).max(1).default(0.7),

  /** Path to a serialized linear risk model (optional) */
  modelPath: z.string().min(1).optional(),
});
export type FusionConfig = z.infer<typeof fusionConfigSchema>;

/**
 * Correlation graph configuration
 */
export const graphConfigSchema = z.object({
  /** TLD allow-list for domains found in free text (CSV string) */
  textDomainTlds: z.string().default('com,net,org,xyz,io,co,uk,info,biz'),
});
export type GraphConfig = z.infer<typeof graphConfigSchema>;

/**
 * Detector execution configuration
 */
export const detectionConfigSchema = z.object({
  detectorTimeoutMs: z.coerce.number().int().min(10).max(60000).default(5000),
});
export type DetectionConfig = z.infer<typeof detectionConfigSchema>;

/**
 * In-memory alert feed configuration
 */
export const alertsConfigSchema = z.object({
  capacity: z.coerce.number().int().min(1).max(200).default(200),

  /** Detections at or above this band are pushed to the feed */
  minBand: riskBandSchema.default('HIGH'),
});
export type AlertsConfig = z.infer<typeof alertsConfigSchema>;

/**
 * Inbound webhook configuration
 */
export const webhookConfigSchema = z.object({
  /** HMAC secret shared with senders (minimum 32 characters). Ingestion is off without it. */
  secret: z.string().min(32).optional(),

  /** Maximum age of a signed timestamp in seconds */
  maxAgeSeconds: z.coerce.number().int().min(10).max(3600).default(300),
});
export type WebhookConfig = z.infer<typeof webhookConfigSchema>;

/**
 * Complete configuration
 */
export const riskweaveConfigSchema = z.object({
  api: apiConfigSchema,
  logging: loggingConfigSchema,
  fusion: fusionConfigSchema,
  graph: graphConfigSchema,
  detection: detectionConfigSchema,
  alerts: alertsConfigSchema,
  webhook: webhookConfigSchema,
});
export type RiskweaveConfig = z.infer<typeof riskweaveConfigSchema>;

/**
 * Parse a CSV string into a lowercased list, dropping empty entries
 */
export function parseCsvList(csv: string): string[] {
  if (!csv || csv.trim() === '') return [];
  return csv
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}
