/**
 * Compression negotiation: picks none, gzip or brotli for a response from its
 * content type, known length, the client's Accept-Encoding and configuration.
 * Decided once, before the first byte is sent.
 */

import * as zlib from 'zlib';
import type { CompressionConfig } from '../config/index.js';
import {
  DEFAULT_COMPRESSION_CONTENT_MINIMUM_LENGTH,
  DEFAULT_COMPRESSION_CONTENT_TYPE_RULE,
} from '../constants.js';
import { CompressionMethod, type AcceptEncoding } from './types.js';

export interface CompressionNegotiatorOptions {
  /** Whether the runtime has a brotli codec; detected when omitted */
  brotliAvailable?: boolean;
  minimumLength?: number;
}

export function isBrotliAvailable(): boolean {
  return typeof zlib.createBrotliCompress === 'function';
}

/**
 * Codecs named in an Accept-Encoding header. Parameters after ';' are ignored
 * except `q=0`, which refuses the codec.
 */
export function parseAcceptEncoding(header: string | undefined): AcceptEncoding {
  const accepted: AcceptEncoding = { gzip: false, br: false };
  if (!header) return accepted;

  for (const item of header.split(',')) {
    const [token = '', ...params] = item.split(';').map((part) => part.trim().toLowerCase());
    const refused = params.some((param) => /^q=0(?:\.0{0,3})?$/.test(param));
    if (refused) continue;
    if (token === 'gzip' || token === 'x-gzip') accepted.gzip = true;
    if (token === 'br') accepted.br = true;
    if (token === '*') {
      accepted.gzip = true;
      accepted.br = true;
    }
  }
  return accepted;
}

/** Prefix-anchored, like a match at position 0 */
function compileRule(rule: string): RegExp | null {
  return rule === '' ? null : new RegExp(`^(?:${rule})`);
}

export class CompressionNegotiator {
  private readonly defaultRule = compileRule(DEFAULT_COMPRESSION_CONTENT_TYPE_RULE);
  private readonly userRule: RegExp | null;
  private readonly brotliAvailable: boolean;
  private readonly minimumLength: number;

  constructor(
    private readonly config: CompressionConfig,
    options: CompressionNegotiatorOptions = {}
  ) {
    this.userRule = compileRule(config.contentTypeUserRule);
    this.brotliAvailable = options.brotliAvailable ?? isBrotliAvailable();
    this.minimumLength = options.minimumLength ?? DEFAULT_COMPRESSION_CONTENT_MINIMUM_LENGTH;
  }

  canBeCompressed(contentType: string): boolean {
    if (this.defaultRule?.test(contentType)) return true;
    return this.userRule?.test(contentType) ?? false;
  }

  /**
   * @param contentLength - undefined when the body is streamed with unknown length
   */
  selectMethod(contentType: string, contentLength: number | undefined, accepted: AcceptEncoding): CompressionMethod {
    if (contentLength !== undefined && contentLength < this.minimumLength) {
      return CompressionMethod.NONE;
    }
    if (!this.canBeCompressed(contentType)) {
      return CompressionMethod.NONE;
    }
    if (this.brotliAvailable && this.config.enableBrotli && accepted.br) {
      return CompressionMethod.BROTLI;
    }
    if (this.config.enableGzip && accepted.gzip) {
      return CompressionMethod.GZIP;
    }
    return CompressionMethod.NONE;
  }
}
