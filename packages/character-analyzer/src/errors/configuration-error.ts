/**
 * ConfigurationError
 *
 * Raised at construction time for invalid settings, e.g. a token budget whose
 * parts exceed the total or an unsupported model provider.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}
