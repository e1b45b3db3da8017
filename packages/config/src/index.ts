export {
  logLevelSchema,
  logFormatSchema,
  riskBandSchema,
  apiConfigSchema,
  loggingConfigSchema,
  DEFAULT_FUSION_WEIGHTS,
  fusionWeightsSchema,
  fusionConfigSchema,
  graphConfigSchema,
  detectionConfigSchema,
  alertsConfigSchema,
  webhookConfigSchema,
  riskweaveConfigSchema,
  parseCsvList,
} from './schema.js';

export type {
  LogLevel,
  LogFormat,
  RiskBandName,
  ApiConfig,
  LoggingConfig,
  FusionWeightsConfig,
  FusionConfig,
  GraphConfig,
  DetectionConfig,
  AlertsConfig,
  WebhookConfig,
  RiskweaveConfig,
} from './schema.js';

export { loadConfig } from './load.js';
