/**
 * Chunk producers for the send strategies: eager bytes split into blocks, and the
 * manual block reader used when the transport cannot send a file itself.
 */

import { RESPONSE_DATA_BLOCK_SIZE } from '../constants.js';
import type { ContentChunk, ZeroCopyFile } from './types.js';

export async function* chunksFromBytes(
  data: Buffer,
  blockSize: number = RESPONSE_DATA_BLOCK_SIZE
): AsyncGenerator<ContentChunk> {
  if (data.length === 0) {
    yield [data, false];
    return;
  }
  for (let start = 0; start < data.length; start += blockSize) {
    const end = Math.min(start + blockSize, data.length);
    yield [data.subarray(start, end), end < data.length];
  }
}

/**
 * Read `count` bytes (or to EOF) in blocks. FileHandle.read runs on the libuv pool,
 * so the event loop is free while a block is read.
 */
export async function* readFileBlocks(
  file: ZeroCopyFile,
  blockSize: number = RESPONSE_DATA_BLOCK_SIZE
): AsyncGenerator<ContentChunk> {
  const { fileHandle, offset, count } = file;
  let sent = 0;

  const readAt = async (length: number): Promise<Buffer> => {
    const buffer = Buffer.alloc(length);
    // null position continues from the handle's current position
    const position = offset === undefined ? null : offset + sent;
    const { bytesRead } = await fileHandle.read(buffer, 0, length, position);
    sent += bytesRead;
    return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
  };

  if (count === undefined) {
    for (;;) {
      const data = await readAt(blockSize);
      const full = data.length === blockSize;
      yield [data, full];
      if (!full) return;
    }
  }

  for (;;) {
    const length = Math.min(blockSize, count - sent);
    const data = await readAt(length);
    // a short read means EOF came before count
    const done = sent >= count || data.length < length;
    yield [data, !done];
    if (done) return;
  }
}

/**
 * Bytes a zero-copy send will transmit: `count`, else the rest of the file after `offset`.
 */
export async function zeroCopyLength(file: ZeroCopyFile): Promise<number> {
  if (file.count !== undefined) return file.count;
  const { size } = await file.fileHandle.stat();
  return Math.max(0, size - (file.offset ?? 0));
}
