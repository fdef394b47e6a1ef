/**
 * Error classes raised by the converter
 */

/**
 * Export document is not well-formed XML
 */
export class XmlParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "XmlParseError";
  }
}

/**
 * Export document parsed but is not an RSS envelope
 */
export class InvalidEnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEnvelopeError";
  }
}

/**
 * An issue was offered after the aggregate was drained
 */
export class AggregatorFinalizedError extends Error {
  constructor(key: string) {
    super(`Cannot offer ${key}: aggregate is already finalized`);
    this.name = "AggregatorFinalizedError";
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Formats any thrown value as "<ErrorName>: <message>"
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
