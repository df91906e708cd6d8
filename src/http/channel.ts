/**
 * Maps the outbound message protocol onto a Node ServerResponse.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { DavError } from '../errors.js';
import { createDavRequest, type DavRequest } from '../request.js';
import type { SendFn } from '../response/index.js';

function write(res: ServerResponse, body: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    res.write(body, (err) => (err ? reject(err) : resolve()));
  });
}

function end(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    res.end(() => resolve());
  });
}

/**
 * Status and headers are applied on response-start and go out with the first
 * write. Node frames the body as chunked when no Content-Length was set.
 * Zero-copy is not offered, so a zero-copy-file message is a caller bug.
 */
export function createHttpChannel(res: ServerResponse): SendFn {
  return async (message) => {
    switch (message.type) {
      case 'response-start':
        res.statusCode = message.status;
        for (const [name, value] of message.headers) {
          res.setHeader(name, value);
        }
        return;
      case 'response-body':
        if (message.body.length > 0) {
          await write(res, message.body);
        }
        if (!message.moreBody) {
          await end(res);
        }
        return;
      case 'zero-copy-file':
        throw new DavError('HTTP channel does not support zero-copy file transmission');
    }
  };
}

function flattenHeaders(req: IncomingMessage): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    entries.push([name, Array.isArray(value) ? value.join(', ') : value]);
  }
  return entries;
}

export function requestFromHttp(req: IncomingMessage, res: ServerResponse): DavRequest {
  const url = req.url ?? '/';
  const queryStart = url.indexOf('?');
  return createDavRequest({
    method: req.method ?? 'GET',
    path: queryStart === -1 ? url : url.slice(0, queryStart),
    headers: flattenHeaders(req),
    send: createHttpChannel(res),
  });
}
