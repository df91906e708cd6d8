/**
 * zlib codecs for gzip and brotli at the configured level.
 */

import { promisify } from 'util';
import * as zlib from 'zlib';
import type { Transform } from 'stream';
import type { CompressLevel } from '../config/index.js';
import { CompressionMethod } from './types.js';

const GZIP_LEVELS: Record<CompressLevel, number> = { fast: 1, default: 4, best: 9 };
const BROTLI_LEVELS: Record<CompressLevel, number> = { fast: 1, default: 4, best: 11 };

const gzipAsync = promisify(zlib.gzip);
const brotliAsync = promisify(zlib.brotliCompress);

type CompressingMethod = CompressionMethod.GZIP | CompressionMethod.BROTLI;

function gzipOptions(level: CompressLevel): zlib.ZlibOptions {
  return { level: GZIP_LEVELS[level] };
}

function brotliOptions(level: CompressLevel): zlib.BrotliOptions {
  return {
    params: {
      [zlib.constants.BROTLI_PARAM_MODE]: zlib.constants.BROTLI_MODE_TEXT,
      [zlib.constants.BROTLI_PARAM_QUALITY]: BROTLI_LEVELS[level],
    },
  };
}

/** Content-Encoding token */
export function encodingName(method: CompressingMethod): string {
  return method === CompressionMethod.GZIP ? 'gzip' : 'br';
}

/**
 * Incremental compressor for a body of unknown length.
 */
export function createCompressor(method: CompressingMethod, level: CompressLevel): Transform {
  return method === CompressionMethod.GZIP
    ? zlib.createGzip(gzipOptions(level))
    : zlib.createBrotliCompress(brotliOptions(level));
}

/**
 * Compress a complete body in one call.
 */
export function compressBuffer(method: CompressingMethod, level: CompressLevel, data: Buffer): Promise<Buffer> {
  return method === CompressionMethod.GZIP
    ? gzipAsync(data, gzipOptions(level))
    : brotliAsync(data, brotliOptions(level));
}
