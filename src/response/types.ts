/**
 * Response content model and the outbound message protocol spoken to the transport.
 */

import type { FileHandle } from 'fs/promises';

export enum CompressionMethod {
  NONE = 'none',
  GZIP = 'gzip',
  BROTLI = 'br',
}

/** One piece of a streamed body and whether more follows */
export type ContentChunk = readonly [chunk: Buffer, moreBody: boolean];

/**
 * A file to transmit, ideally without copying through the process.
 * Without `count` the file is sent from `offset` (or its current position) to EOF.
 */
export interface ZeroCopyFile {
  fileHandle: FileHandle;
  offset?: number;
  count?: number;
}

/**
 * Exactly one representation is active at a time.
 */
export type ResponseContent =
  | { kind: 'bytes'; data: Buffer }
  | { kind: 'stream'; chunks: AsyncIterable<ContentChunk> }
  | { kind: 'zero-copy-file'; file: ZeroCopyFile };

export type ResponseType = 'html' | 'xml' | 'none';

export interface ResponseStartMessage {
  type: 'response-start';
  status: number;
  headers: Array<[string, string]>;
}

export interface ResponseBodyMessage {
  type: 'response-body';
  body: Buffer;
  moreBody: boolean;
}

export interface ZeroCopyFileMessage {
  type: 'zero-copy-file';
  file: FileHandle;
  offset?: number;
  count?: number;
  moreBody: boolean;
}

/**
 * Start exactly once, then one or more bodies; the last has moreBody=false.
 */
export type OutboundMessage = ResponseStartMessage | ResponseBodyMessage | ZeroCopyFileMessage;

export type SendFn = (message: OutboundMessage) => Promise<void>;

/** Codecs the client declared in Accept-Encoding */
export interface AcceptEncoding {
  gzip: boolean;
  br: boolean;
}
