/**
 * Root entrypoint for restline: re-exports the client, the default transport, types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';

/**
 * Default `undici` transport; replace it through `RestClientBuilder.fetchProvider`.
 */
export { FetchClient } from './fetch/client.js';

export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderMultimap,
  HttpMethod,
  HttpVersion,
  QueryParameters,
  RedirectPolicy,
  TransportOptions,
  TransportRequest,
  TransportResponse,
} from './types/request.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
