import { loadConfig } from "../config/loader.js";
import { createLogger } from "../logging/logger.js";
import { createServices, type AnalyticsServices } from "../gateway/lifecycle.js";

/**
 * Opens the analytics store for a one-shot command and closes it afterwards.
 * Only errors are logged so command output stays machine-readable.
 */
export async function withServices<T>(
  configPath: string | undefined,
  fn: (services: AnalyticsServices) => T | Promise<T>,
): Promise<T> {
  const config = loadConfig(configPath);
  const logger = createLogger({ ...config.logging, level: "error", json: true });
  const services = createServices(config, logger);
  try {
    return await fn(services);
  } finally {
    services.db.close();
  }
}
