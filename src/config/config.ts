import { AppConfig, getAppConfig } from "./app.config";
import { ConversionConfig, getConversionConfig } from "./conversion.config";

/**
 * Complete application configuration
 */
export interface Config {
  app: AppConfig;
  conversion: ConversionConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { AppConfig, ConversionConfig };

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig(): Config {
  return {
    app: getAppConfig(),
    conversion: getConversionConfig(),
  };
}

/**
 * Validates that all configuration values are valid
 * Throws descriptive errors if a value cannot be parsed
 */
export function validateConfig(): void {
  try {
    getConfig();
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
