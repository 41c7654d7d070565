export { BufferOverflowError } from './errors.js';
export { JsonlDecoder, type JsonlDecoderOptions } from './JsonlDecoder.js';
export { LineAccumulator, toBuffer, type LineAccumulatorOptions } from './LineAccumulator.js';
export {
  MessagePipeline,
  type MessagePipelineOptions,
  type PipelineStats,
} from './MessagePipeline.js';
export { isRecord, isStreamMessage, requireKeys } from './schema.js';
export type {
  BufferOverflow,
  DecodedMessage,
  DecodeFailure,
  MessageSchema,
  OverflowPolicy,
  PipelineItem,
  RawChunk,
} from './types.js';
