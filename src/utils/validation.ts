/**
 * Validation utilities for configuration and inputs
 */

import { ConfigError } from "../types/errors";

/**
 * Jira issue key: uppercase letter, uppercase letters or digits, hyphen, digits
 */
const ISSUE_KEY_REGEX = /^[A-Z][A-Z0-9]+-\d+$/;

const TRUE_VALUES = ["true", "1", "yes", "y", "on"];
const FALSE_VALUES = ["false", "0", "no", "n", "off"];

/**
 * Validates Jira issue key format (e.g. "PROJ-123"); surrounding whitespace is ignored
 */
export function isIssueKey(value: string | null | undefined): boolean {
  return typeof value === "string" && ISSUE_KEY_REGEX.test(value.trim());
}

/**
 * Validates that a string is not empty after trimming
 */
export function isNonEmptyString(value: string): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value : defaultValue;
}

/**
 * Parses an optional boolean environment variable
 * @throws {ConfigError} When the value is set but not a recognizable boolean
 */
export function getOptionalBoolean(
  name: string,
  value: string | undefined,
  defaultValue: boolean
): boolean {
  if (!value || !isNonEmptyString(value)) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }

  throw new ConfigError(
    `Invalid ${name}: ${value}\n` +
      `Expected one of: ${[...TRUE_VALUES, ...FALSE_VALUES].join(", ")}`
  );
}
