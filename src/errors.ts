/**
 * Error types raised by the versioner services.
 *
 * Services throw these; command handlers catch them and map them to exit
 * code 1.
 */

/**
 * No `__version__.py` could be located, or the located file holds no
 * parsable `__version__` assignment.
 */
export class VersionNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VersionNotFoundError';
  }
}

/**
 * A bundle YAML document is missing, unparsable, or could not be written.
 */
export class YamlUpdateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'YamlUpdateError';
  }
}

/**
 * `versioner.json` exists but cannot be read or holds a value of the wrong type.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
