import { ConfigurationError } from '@toolgate/core';

/**
 * Thrown when a backend handle could not be constructed (unreachable host,
 * rejected credentials, malformed value). Not cached: a later call retries.
 */
export class ConnectionError extends Error {
  constructor(
    public readonly category: string,
    cause?: unknown,
  ) {
    super(
      `Connection failed for "${category}"${cause instanceof Error ? `: ${cause.message}` : ''}`,
    );
    this.name = 'ConnectionError';
    this.cause = cause;
  }
}

/** Thrown when a category's `provider` discriminator names no known implementation. */
export class UnsupportedProviderError extends ConfigurationError {
  constructor(
    category: string,
    public readonly provider: string | undefined,
    public readonly supported: readonly string[],
  ) {
    super(
      provider === undefined
        ? `No provider configured for "${category}". Valid providers are: ${supported.join(', ')}`
        : `Unsupported provider "${provider}" for "${category}". Valid providers are: ${supported.join(', ')}`,
      category,
    );
    this.name = 'UnsupportedProviderError';
  }
}
