export type PacketType = 0 | 1 | 2 | 3

export type HeaderField = 'ID' | 'DATA'

// string for the text formats, unsigned integer for the frame formats
// (bigint once a field is wider than a double can hold exactly)
export type PacketValue = string | number | bigint | Uint8Array

export type XMode = 'inline' | 'time' | 'index'

export interface GraphDefinition {
  title?: string
  x: {
    mode: XMode
    packetId?: string
    xAxis?: string
  }
  y: {
    packetId: string
    yAxis?: string
  }
}

export interface FilterVerdict {
  accept: boolean
  value?: PacketValue
}

// Expected to return a boolean or a FilterVerdict; anything else is a filter error.
export type PacketFilter = (id: string, value: PacketValue) => unknown

interface BaseFormat {
  packetIds: ReadonlySet<string>
  graphDefinitions: ReadonlyMap<string, GraphDefinition>
  filter?: PacketFilter
  filterSource?: string  // set when the filter was compiled from a function body
}

export interface HumanReadableFormat extends BaseFormat {
  type: 0
  packetDelimiters: readonly string[]
  dataDelimiters: readonly string[]
  ignore: readonly string[]
}

export interface PairedTokenFormat extends BaseFormat {
  type: 1
  packetDelimiters: readonly string[]
  dataDelimiters: readonly string[]
  specifiers: readonly [idSpecifier: string, dataSpecifier: string]
}

export interface ByteFrameFormat extends BaseFormat {
  type: 2
  headerOrder: readonly HeaderField[]
  headerLen: readonly number[]  // bytes
}

export interface BitFrameFormat extends BaseFormat {
  type: 3
  headerOrder: readonly HeaderField[]
  headerLen: readonly number[]  // bits
}

export type FrameFormat = ByteFrameFormat | BitFrameFormat

export type FormatDescriptor =
  | HumanReadableFormat
  | PairedTokenFormat
  | ByteFrameFormat
  | BitFrameFormat

export interface PacketCandidate {
  id: string
  value: PacketValue
}

export interface ParsedPacket {
  readonly id: string
  readonly value: PacketValue
  readonly text: string          // "<id>: <value>" for the raw monitor
  readonly parseTime: bigint     // monotonic ns
  readonly sequenceIndex: number
}

export type ResyncReason = 'unknown-id' | 'malformed' | 'unpaired' | 'overflow'
export type FilterReason = 'not-listed' | 'rejected' | 'error'

export type DropRecord =
  | { kind: 'resync'; reason: ResyncReason; detail: string }
  | { kind: 'filter'; reason: FilterReason; id: string; detail: string }

export interface DecodeResult {
  packets: PacketCandidate[]
  dropped: DropRecord[]
}

export interface PacketDecoder {
  readonly type: PacketType
  readonly name: string
  decode(chunk: Uint8Array): DecodeResult
  reset(): void
}

export type SampleCoordinate = string | number | bigint | Uint8Array

export interface Sample {
  x: SampleCoordinate
  y: PacketValue
}

export interface SeriesSample extends Sample {
  seriesId: string
}
