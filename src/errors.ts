/**
 * Raised when one or more required environment variables are missing.
 * `message` holds one "<NAME> is not set" line per missing variable.
 */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(missing.map(name => `${name} is not set`).join('\n'));
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * Raised when the request never produced an HTTP response (DNS, refused connection, socket errors).
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}
