/**
 * ConfigurationError - a required setting is missing or invalid
 *
 * Raised before any network call is attempted. The message always names the
 * offending setting (or file path) so it can be shown to the user as is.
 */
export class ConfigurationError extends Error {
  /**
   * Name of the setting that failed validation
   */
  readonly key: string;

  constructor(params: { key: string; message: string }) {
    super(params.message);
    this.name = 'ConfigurationError';
    this.key = params.key;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  static missing(key: string): ConfigurationError {
    return new ConfigurationError({
      key,
      message: `Missing required setting: ${key}`,
    });
  }

  static fileNotFound(key: string, path: string): ConfigurationError {
    return new ConfigurationError({
      key,
      message: `Credentials file not found: ${path}`,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      error: 'ConfigurationError',
      key: this.key,
      message: this.message,
    };
  }
}
