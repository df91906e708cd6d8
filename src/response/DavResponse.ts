/**
 * DavResponse
 *
 * The response envelope: status, ordered headers (names kept exactly as they go on
 * the wire), one active content representation, and range framing. The sender adds
 * Content-Length, Content-Encoding and Authentication-Info while sending.
 */

import { chunksFromBytes } from './content.js';
import {
  CompressionMethod,
  type ContentChunk,
  type ResponseContent,
  type ResponseType,
  type ZeroCopyFile,
} from './types.js';

export type ContentInput = Buffer | string | AsyncIterable<ContentChunk> | ZeroCopyFile;

export interface DavResponseInit {
  status: number;
  /** Merged over the defaults of `responseType` */
  headers?: Record<string, string> | Array<[string, string]>;
  responseType?: ResponseType;
  content?: ContentInput;
  /** Overrides the length derived from bytes content; with contentRangeStart, the total size */
  contentLength?: number;
  contentRangeStart?: number;
}

const DEFAULT_HEADERS: Record<ResponseType, Array<[string, string]>> = {
  html: [['Content-Type', 'text/html']],
  xml: [['Content-Type', 'application/xml']],
  none: [],
};

function isAsyncIterable(value: object): value is AsyncIterable<ContentChunk> {
  return Symbol.asyncIterator in value;
}

function toEntries(headers: Record<string, string> | Array<[string, string]>): Array<[string, string]> {
  return Array.isArray(headers) ? headers : Object.entries(headers);
}

export class DavResponse {
  status: number;
  readonly headers: Map<string, string>;
  compressionMethod: CompressionMethod = CompressionMethod.NONE;
  /** Bytes that will be transmitted; undefined means chunked framing */
  contentLength: number | undefined;
  contentRange = false;
  contentRangeStart: number | undefined;

  private _content: ResponseContent = { kind: 'bytes', data: Buffer.alloc(0) };

  constructor(init: DavResponseInit) {
    this.status = init.status;
    this.headers = new Map(DEFAULT_HEADERS[init.responseType ?? 'html']);
    if (init.headers) {
      for (const [name, value] of toEntries(init.headers)) {
        this.setHeader(name, value);
      }
    }

    this.content = init.content ?? Buffer.alloc(0);
    if (init.contentLength !== undefined) {
      this.contentLength = init.contentLength;
    }

    if (init.contentLength !== undefined && init.contentRangeStart !== undefined) {
      const total = init.contentLength;
      const start = init.contentRangeStart;
      this.contentRange = true;
      this.contentRangeStart = start;
      this.contentLength = total - start;
      // range end is the total size, not size - 1; some clients depend on it
      this.setHeader('Content-Range', `bytes ${start}-${total}/${total}`);
    }
  }

  get content(): ResponseContent {
    return this._content;
  }

  /**
   * Replaces whichever representation was active. Bytes set the length;
   * streams and files clear it.
   */
  set content(value: ContentInput) {
    if (typeof value === 'string') {
      value = Buffer.from(value, 'utf-8');
    }
    if (Buffer.isBuffer(value)) {
      this._content = { kind: 'bytes', data: value };
      this.contentLength = value.length;
    } else if (isAsyncIterable(value)) {
      this._content = { kind: 'stream', chunks: value };
      this.contentLength = undefined;
    } else {
      this._content = { kind: 'zero-copy-file', file: value };
      this.contentLength = undefined;
    }
  }

  /**
   * Body chunks for the bytes and stream variants. A stream can be consumed once.
   */
  chunks(): AsyncIterable<ContentChunk> {
    switch (this._content.kind) {
      case 'bytes':
        return chunksFromBytes(this._content.data);
      case 'stream':
        return this._content.chunks;
      case 'zero-copy-file':
        throw new TypeError('zero-copy file content has no chunk stream');
    }
  }

  /**
   * Case-insensitive header lookup.
   */
  getHeader(name: string): string | undefined {
    const lower = name.toLowerCase();
    for (const [key, value] of this.headers) {
      if (key.toLowerCase() === lower) return value;
    }
    return undefined;
  }

  /**
   * Sets a header, replacing any entry whose name differs only in case.
   */
  setHeader(name: string, value: string): void {
    this.deleteHeader(name, name);
    this.headers.set(name, value);
  }

  /**
   * Removes every case-insensitive match of `name` except an entry spelled `keep`.
   */
  deleteHeader(name: string, keep?: string): void {
    const lower = name.toLowerCase();
    for (const key of [...this.headers.keys()]) {
      if (key !== keep && key.toLowerCase() === lower) {
        this.headers.delete(key);
      }
    }
  }

  /**
   * `status|length|kind|range|rangeStart` followed by one header per line.
   */
  describe(): string {
    const fields = [
      this.status,
      this.contentLength ?? '-',
      this._content.kind,
      this.contentRange,
      this.contentRangeStart ?? '-',
    ];
    const lines = [fields.join('|')];
    for (const [name, value] of this.headers) {
      lines.push(`  ${name}: ${value}`);
    }
    return lines.join('\n');
  }

  static methodNotAllowed(method: string): DavResponse {
    return new DavResponse({
      status: 405,
      content: `method:${method} is not support method`,
    });
  }
}
