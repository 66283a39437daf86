import type { ConfigCategory, ResolvedConfig } from '@toolgate/core';
import { BackendManager, type BackendManagerOptions } from './backend-manager.js';
import { HttpClient, type HttpClientOptions } from './http-client.js';

export interface HttpApiManagerOptions extends BackendManagerOptions {
  category: ConfigCategory;
  /** Keys the client cannot be built without (base URL, credentials). */
  requiredKeys?: readonly string[];
  /** Map the integration's configuration to client options. */
  buildOptions: (config: ResolvedConfig) => HttpClientOptions;
}

/** One HttpClient per external API category (`external.datadog`, `external.jira`, ...). */
export class HttpApiManager extends BackendManager<HttpClient> {
  readonly kind = 'http api';
  private readonly category: ConfigCategory;
  private readonly required: readonly string[];
  private readonly buildOptions: (config: ResolvedConfig) => HttpClientOptions;

  constructor(options: HttpApiManagerOptions) {
    super(options);
    this.category = options.category;
    this.required = options.requiredKeys ?? [];
    this.buildOptions = options.buildOptions;
  }

  getConfigCategory(): ConfigCategory {
    return this.category;
  }

  protected override requiredKeys(): readonly string[] {
    return this.required;
  }

  protected async connect(config: ResolvedConfig): Promise<HttpClient> {
    return new HttpClient(this.buildOptions(config));
  }

  // fetch() keeps no per-client sockets to release
  protected async disconnect(): Promise<void> {}
}
