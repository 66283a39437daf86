export { BackendManager } from './backend-manager.js';
export type { BackendManagerOptions, ConnectionInfo } from './backend-manager.js';
export { ProviderFactory } from './provider-factory.js';
export type {
  ProviderBuilder,
  ProviderBuildContext,
  ProviderFactoryOptions,
} from './provider-factory.js';
export { HttpClient, HttpStatusError } from './http-client.js';
export type { HttpClientOptions, HttpRequest, QueryValue } from './http-client.js';
export { HttpApiManager } from './http-api-manager.js';
export type { HttpApiManagerOptions } from './http-api-manager.js';
export { RedisConnectionManager } from './redis-manager.js';
export { ConnectionError, UnsupportedProviderError } from './errors.js';
