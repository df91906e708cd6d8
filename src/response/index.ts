export {
  CompressionMethod,
  type AcceptEncoding,
  type ContentChunk,
  type OutboundMessage,
  type ResponseBodyMessage,
  type ResponseContent,
  type ResponseStartMessage,
  type ResponseType,
  type SendFn,
  type ZeroCopyFile,
  type ZeroCopyFileMessage,
} from './types.js';
export { DavResponse, type ContentInput, type DavResponseInit } from './DavResponse.js';
export {
  CompressionNegotiator,
  isBrotliAvailable,
  parseAcceptEncoding,
  type CompressionNegotiatorOptions,
} from './CompressionNegotiator.js';
export { compressBuffer, createCompressor, encodingName } from './codecs.js';
export { chunksFromBytes, readFileBlocks, zeroCopyLength } from './content.js';
export { StreamingSender, type SendContext, type StreamingSenderOptions } from './StreamingSender.js';
