export { validateFormat, sameFormat } from './formatDescriptor'
export { ConfigError } from './errors'
export { DelimitedSplitter, FrameChunker, splitOnFirst } from './streamSplitter'
export { createDecoder } from './registry'
export { HumanReadableDecoder } from './builtins/humanReadableDecoder'
export { PairedTokenDecoder } from './builtins/pairedTokenDecoder'
export { ByteFrameDecoder, BitFrameDecoder, layoutFrame } from './builtins/frameDecoder'
export { compileFilter, createFilterStage } from './filter'
export { processChunk, PacketStamper, monotonicClock } from './pipeline'
export type { ConfigViolation } from './errors'
export type { DecoderOptions } from './registry'
export type { FilterOutcome, FilterStage } from './filter'
export type { ChunkResult, Clock, PipelineStages } from './pipeline'
export type {
  BitFrameFormat,
  ByteFrameFormat,
  DecodeResult,
  DropRecord,
  FilterReason,
  FilterVerdict,
  FormatDescriptor,
  FrameFormat,
  GraphDefinition,
  HeaderField,
  HumanReadableFormat,
  PacketCandidate,
  PacketDecoder,
  PacketFilter,
  PacketType,
  PacketValue,
  PairedTokenFormat,
  ParsedPacket,
  ResyncReason,
  Sample,
  SampleCoordinate,
  SeriesSample,
  XMode,
} from './types'
