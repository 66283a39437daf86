import type { ConfigCategory, ConfigProvider, Logger, ResolvedConfig } from '@toolgate/core';
import { ConfigurationError, requireKeys } from '@toolgate/core';
import { ConnectionError } from './errors.js';

export interface BackendManagerOptions {
  config: ConfigProvider;
  logger: Logger;
}

export interface ConnectionInfo {
  kind: string;
  category: ConfigCategory;
  connected: ConfigCategory[];
  pending: ConfigCategory[];
}

/**
 * Lazily constructs and caches one backend handle per category.
 *
 * The first `getClient()` for a category resolves its configuration, checks
 * the required keys, and calls `connect()`. Concurrent first requests share
 * the in-flight construction. A failed construction is not cached.
 * Configuration errors propagate as-is; anything else thrown while connecting
 * is wrapped in ConnectionError. No retries happen here.
 */
export abstract class BackendManager<THandle> {
  /** Human-readable backend kind, used in logs. */
  abstract readonly kind: string;

  protected readonly config: ConfigProvider;
  protected readonly logger: Logger;
  private readonly handles = new Map<ConfigCategory, THandle>();
  private readonly pending = new Map<ConfigCategory, Promise<THandle>>();

  constructor(options: BackendManagerOptions) {
    this.config = options.config;
    this.logger = options.logger;
  }

  /** The category this manager serves when none is given. */
  abstract getConfigCategory(): ConfigCategory;

  /** Build a handle from resolved configuration. */
  protected abstract connect(config: ResolvedConfig, category: ConfigCategory): Promise<THandle>;

  /** Release a handle's sockets or pools. */
  protected abstract disconnect(handle: THandle, category: ConfigCategory): Promise<void>;

  /** Keys that must be present before `connect()` is attempted. */
  protected requiredKeys(_config: ResolvedConfig, _category: ConfigCategory): readonly string[] {
    return [];
  }

  /** Get (constructing on first use) the handle for a category. */
  async getClient(category: ConfigCategory = this.getConfigCategory()): Promise<THandle> {
    const existing = this.handles.get(category);
    if (existing !== undefined) return existing;

    const inFlight = this.pending.get(category);
    if (inFlight) return inFlight;

    const construction = this.construct(category);
    this.pending.set(category, construction);
    try {
      const handle = await construction;
      // A reset() or closeAll() while connecting dropped the pending entry:
      // the late handle is closed instead of being handed out unowned.
      if (this.pending.get(category) !== construction) {
        await this.closeHandle(handle, category);
        throw new ConnectionError(category, new Error('Closed while connecting'));
      }
      this.handles.set(category, handle);
      return handle;
    } finally {
      if (this.pending.get(category) === construction) {
        this.pending.delete(category);
      }
    }
  }

  /** True when a handle for the category is cached. */
  isConnected(category: ConfigCategory = this.getConfigCategory()): boolean {
    return this.handles.has(category);
  }

  /** Drop (and close) the cached handle of one category, or of all of them. */
  async reset(category?: ConfigCategory): Promise<void> {
    const categories = category === undefined ? [...this.handles.keys()] : [category];
    if (category === undefined) {
      this.pending.clear();
    } else {
      this.pending.delete(category);
    }
    await this.closeHandles(categories);
  }

  /** Close every cached handle. Failures are logged, never thrown. */
  async closeAll(): Promise<void> {
    this.pending.clear();
    await this.closeHandles([...this.handles.keys()]);
  }

  getConnectionInfo(): ConnectionInfo {
    return {
      kind: this.kind,
      category: this.getConfigCategory(),
      connected: [...this.handles.keys()],
      pending: [...this.pending.keys()],
    };
  }

  private async construct(category: ConfigCategory): Promise<THandle> {
    const config = this.config.resolve(category);
    requireKeys(category, config, this.requiredKeys(config, category));

    try {
      const handle = await this.connect(config, category);
      this.logger.info(`Connected ${this.kind} backend for "${category}"`);
      return handle;
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof ConnectionError) {
        throw err;
      }
      this.logger.error(
        `Failed to connect ${this.kind} backend for "${category}": ${err instanceof Error ? err.message : String(err)}`,
      );
      throw new ConnectionError(category, err);
    }
  }

  private async closeHandles(categories: ConfigCategory[]): Promise<void> {
    const closing = categories.flatMap((category) => {
      const handle = this.handles.get(category);
      if (handle === undefined) return [];
      this.handles.delete(category);
      return [this.closeHandle(handle, category)];
    });
    await Promise.all(closing);
  }

  // Close failures are logged, never thrown.
  private async closeHandle(handle: THandle, category: ConfigCategory): Promise<void> {
    try {
      await this.disconnect(handle, category);
    } catch (err) {
      this.logger.warn(
        `Failed to close ${this.kind} backend for "${category}": ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
