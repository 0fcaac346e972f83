// src/core/errors.ts

/**
 * A required parameter was omitted, or a combination of options cannot be
 * resolved to a valid path. Always raised before any I/O.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The configuration file or environment is missing or invalid.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

function readProperty(value: unknown, property: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Reflect.get(value, property);
}

/**
 * True when the object store (or filesystem) reports that the addressed
 * object does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  const name = readProperty(error, 'name');
  if (name === 'NotFound' || name === 'NoSuchKey') return true;
  if (readProperty(error, 'code') === 'ENOENT') return true;

  const metadata = readProperty(error, '$metadata');
  return readProperty(metadata, 'httpStatusCode') === 404;
}
