/**
 * The per-request view shared by authentication and response delivery.
 */

import type { AuthRequest } from './auth/index.js';
import { parseAcceptEncoding, type SendContext, type SendFn } from './response/index.js';

export interface DavRequest extends AuthRequest, SendContext {
  path: string;
}

export interface DavRequestInit {
  method: string;
  path: string;
  headers: Array<[string, string]> | Record<string, string>;
  send: SendFn;
  zeroCopySend?: boolean;
}

function headerEntries(headers: DavRequestInit['headers']): Array<[string, string]> {
  return Array.isArray(headers) ? headers : Object.entries(headers);
}

/**
 * Build a request from transport data. Header names are lower-cased; a repeated
 * header keeps its last value.
 */
export function createDavRequest(init: DavRequestInit): DavRequest {
  const headers = new Map<string, string>();
  for (const [name, value] of headerEntries(init.headers)) {
    headers.set(name.toLowerCase(), value);
  }

  return {
    method: init.method.toUpperCase(),
    path: init.path,
    headers,
    userAgent: headers.get('user-agent') ?? '',
    acceptEncoding: parseAcceptEncoding(headers.get('accept-encoding')),
    send: init.send,
    zeroCopySend: init.zeroCopySend ?? false,
  };
}
