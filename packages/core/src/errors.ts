/**
 * Thrown when a category is unknown, a required key is absent, or a value
 * (such as a guardrail bound) is out of range. Raised before any network I/O.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly category?: string,
    public readonly missingKeys: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
