/**
 * Raised for invalid static configuration: grid cell size, degenerate regions,
 * combiner weights and malformed rule tables. Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
