/**
 * DAV gateway core: authentication and response delivery for an HTTP/WebDAV server.
 */

export * from './auth/index.js';
export * from './config/index.js';
export * from './http/index.js';
export * from './listing/index.js';
export * from './logging/index.js';
export * from './response/index.js';
export { DAV_REALM, RESPONSE_DATA_BLOCK_SIZE } from './constants.js';
export { ConfigError, DavError } from './errors.js';
export { createDavRequest, type DavRequest, type DavRequestInit } from './request.js';
export { DavGateway } from './DavGateway.js';
export { KeyedMutex } from './util/KeyedMutex.js';
