import { getOptional } from "../utils/validation";
import { DEFAULT_I18N_DIRECTORY } from "../services/i18n-service";

/**
 * Application configuration
 */
export interface AppConfig {
  /** Preferred UI language; empty means ask (interactive) or fall back to English */
  lang: string;
  i18nDirectory: string;
  /** Disable colored output (NO_COLOR convention) */
  noColor: boolean;
}

/**
 * Retrieves application configuration from environment variables
 */
export function getAppConfig(): AppConfig {
  const lang = getOptional(process.env.JIRA_JSONL_LANG, "");
  const i18nDirectory = getOptional(
    process.env.JIRA_JSONL_I18N_DIR,
    DEFAULT_I18N_DIRECTORY
  );

  return {
    lang,
    i18nDirectory,
    noColor: process.env.NO_COLOR !== undefined,
  };
}
