import { loadConfig, type DroidriskConfig } from '@droidrisk/config';

/**
 * Singleton config instance
 */
let configInstance: DroidriskConfig | null = null;

/**
 * Get the singleton config instance, loaded from process.env on first use
 */
export function getConfig(): DroidriskConfig {
  if (!configInstance) {
    configInstance = loadConfig(process.env);
  }
  return configInstance;
}
