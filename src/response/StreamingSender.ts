/**
 * Streaming Sender
 *
 * Frames a DavResponse onto the transport's message channel using one of four
 * strategies:
 * - direct: Content-Length when known, body chunks in their original boundaries
 * - zero-copy file: delegated to the transport when it can, else read in blocks
 * - gzip / brotli: body fed through the codec chunk by chunk
 *
 * For compressed bodies the start message waits for the first source chunk. If that
 * chunk is also the last, the compressed length is known and declared; otherwise no
 * Content-Length is sent and the transport frames the body as chunked.
 */

import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { AuthResult } from '../auth/index.js';
import type { CompressLevel } from '../config/index.js';
import { RESPONSE_DATA_BLOCK_SIZE } from '../constants.js';
import { getLogger } from '../logging/index.js';
import { compressBuffer, createCompressor, encodingName } from './codecs.js';
import type { CompressionNegotiator } from './CompressionNegotiator.js';
import { readFileBlocks, zeroCopyLength } from './content.js';
import type { DavResponse } from './DavResponse.js';
import {
  CompressionMethod,
  type AcceptEncoding,
  type ContentChunk,
  type SendFn,
  type ZeroCopyFile,
} from './types.js';

const logger = getLogger('response');

/**
 * What the sender needs from the request being answered.
 */
export interface SendContext {
  send: SendFn;
  acceptEncoding: AcceptEncoding;
  /** Transport accepts zero-copy-file messages */
  zeroCopySend: boolean;
  authResult?: AuthResult;
}

export interface StreamingSenderOptions {
  negotiator: CompressionNegotiator;
  level: CompressLevel;
  /** Block size of the manual file reader */
  blockSize?: number;
}

export class StreamingSender {
  private readonly negotiator: CompressionNegotiator;
  private readonly level: CompressLevel;
  private readonly blockSize: number;

  constructor(options: StreamingSenderOptions) {
    this.negotiator = options.negotiator;
    this.level = options.level;
    this.blockSize = options.blockSize ?? RESPONSE_DATA_BLOCK_SIZE;
  }

  async send(request: SendContext, response: DavResponse): Promise<void> {
    const authInfo = request.authResult?.mutualAuthInfo;
    if (authInfo) {
      response.setHeader('Authentication-Info', authInfo);
    }

    const content = response.content;
    if (content.kind === 'zero-copy-file') {
      if (response.contentLength === undefined) {
        response.contentLength = await zeroCopyLength(content.file);
      }
      response.compressionMethod = CompressionMethod.NONE;
    } else {
      response.compressionMethod = this.negotiator.selectMethod(
        response.getHeader('Content-Type') ?? '',
        response.contentLength,
        request.acceptEncoding
      );
    }

    if (logger.isDebugEnabled()) {
      logger.debug(`${response.compressionMethod}|${response.describe()}`);
    }

    const method = response.compressionMethod;
    if (method === CompressionMethod.NONE) {
      await this.sendDirect(request, response);
    } else {
      await this.sendCompressed(request, response, method);
    }
  }

  private async sendDirect(request: SendContext, response: DavResponse): Promise<void> {
    if (response.contentLength !== undefined) {
      response.setHeader('Content-Length', String(response.contentLength));
    }
    await this.sendStart(request, response);

    const content = response.content;
    if (content.kind === 'zero-copy-file') {
      await this.sendFile(request, content.file);
      return;
    }

    let finished = false;
    for await (const [body, moreBody] of response.chunks()) {
      await request.send({ type: 'response-body', body, moreBody });
      if (!moreBody) {
        finished = true;
        break;
      }
    }
    if (!finished) {
      logger.debug('content stream ended without a final chunk');
      await request.send({ type: 'response-body', body: Buffer.alloc(0), moreBody: false });
    }
  }

  private async sendFile(request: SendContext, file: ZeroCopyFile): Promise<void> {
    if (request.zeroCopySend) {
      await request.send({
        type: 'zero-copy-file',
        file: file.fileHandle,
        offset: file.offset,
        count: file.count,
        moreBody: false,
      });
      return;
    }

    for await (const [body, moreBody] of readFileBlocks(file, this.blockSize)) {
      await request.send({ type: 'response-body', body, moreBody });
    }
  }

  private async sendCompressed(
    request: SendContext,
    response: DavResponse,
    method: CompressionMethod.GZIP | CompressionMethod.BROTLI
  ): Promise<void> {
    response.setHeader('Content-Encoding', encodingName(method));

    const iterator = response.chunks()[Symbol.asyncIterator]();
    try {
      const first = await iterator.next();
      if (first.done) {
        logger.debug('content stream ended without a final chunk');
      }
      const firstChunk: ContentChunk = first.done ? [Buffer.alloc(0), false] : first.value;
      const [firstBody, firstMore] = firstChunk;

      if (!firstMore) {
        const compressed = await compressBuffer(method, this.level, firstBody);
        response.setHeader('Content-Length', String(compressed.length));
        await this.sendStart(request, response);
        await request.send({ type: 'response-body', body: compressed, moreBody: false });
        return;
      }

      response.deleteHeader('Content-Length');
      await this.sendStart(request, response);

      async function* source(): AsyncGenerator<Buffer> {
        yield firstBody;
        for (;;) {
          const next = await iterator.next();
          if (next.done) {
            logger.debug('content stream ended without a final chunk');
            return;
          }
          const [body, moreBody] = next.value;
          yield body;
          if (!moreBody) return;
        }
      }

      await pipeline(
        Readable.from(source()),
        createCompressor(method, this.level),
        async (compressed: AsyncIterable<Buffer>) => {
          for await (const body of compressed) {
            await request.send({ type: 'response-body', body, moreBody: true });
          }
        }
      );
      await request.send({ type: 'response-body', body: Buffer.alloc(0), moreBody: false });
    } finally {
      // the source stops being read at its final chunk; let it release what it holds
      await iterator.return?.();
    }
  }

  private sendStart(request: SendContext, response: DavResponse): Promise<void> {
    return request.send({
      type: 'response-start',
      status: response.status,
      headers: [...response.headers],
    });
  }
}
