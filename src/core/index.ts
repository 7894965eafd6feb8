/**
 * Core entrypoint: exports the client, its builders and the response wrapper.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

export { RestClientBuilder } from './builder.js';
export { RestClient } from './client.js';
export { RequestOptions, RequestOptionsBuilder } from './options.js';
export { RestResponse } from './response.js';
export type { ClientConfig, RestClientFailure, RestClientProps, RestResult } from './types.js';
