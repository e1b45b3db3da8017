import { loadConfig, type RiskweaveConfig } from '@riskweave/config';

let configInstance: RiskweaveConfig | null = null;

/**
 * Get the singleton config instance, loaded from the environment on first use
 */
export function getConfig(): RiskweaveConfig {
  if (!configInstance) {
    configInstance = loadConfig(process.env);
  }
  return configInstance;
}
