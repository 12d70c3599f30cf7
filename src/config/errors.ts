/**
 * Raised for an invalid environment or run settings file.
 *
 * @module config/errors
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
