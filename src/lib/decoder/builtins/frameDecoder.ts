import type {
  BitFrameFormat,
  ByteFrameFormat,
  DecodeResult,
  FrameFormat,
  HeaderField,
  PacketDecoder,
} from '../types'
import { FrameChunker } from '../streamSplitter'
import { renderHexId, toFieldValue } from './fieldFormat'

export interface FieldLayout {
  header: HeaderField
  bits: number
  shift: bigint  // distance of the field's low bit from the frame's low bit
  mask: bigint
}

export interface FrameLayout {
  frameBits: number    // bits consumed from the stream per frame
  paddingBits: number  // zero bits ahead of the first field
  fields: FieldLayout[]
}

/**
 * Lays the header fields out over a frame. Frames always occupy whole bytes;
 * when the fields do not add up to a byte boundary the spare bits sit at the
 * most significant end of the frame.
 */
export function layoutFrame(headerOrder: readonly HeaderField[], headerLen: readonly number[], unitBits: number): FrameLayout {
  const fieldBits = headerLen.map((len) => len * unitBits)
  const totalBits = fieldBits.reduce((sum, bits) => sum + bits, 0)
  const frameBits = Math.ceil(totalBits / 8) * 8
  const paddingBits = frameBits - totalBits

  let start = paddingBits
  const fields = headerOrder.map((header, i) => {
    const bits = fieldBits[i]
    const field: FieldLayout = {
      header,
      bits,
      shift: BigInt(frameBits - start - bits),
      mask: (1n << BigInt(bits)) - 1n,
    }
    start += bits
    return field
  })
  return { frameBits, paddingBits, fields }
}

function fieldValue(frame: bigint, field: FieldLayout): bigint {
  return (frame >> field.shift) & field.mask
}

abstract class FieldFrameDecoder<F extends FrameFormat> implements PacketDecoder {
  abstract readonly type: F['type']
  abstract readonly name: string
  readonly layout: FrameLayout
  private readonly chunker: FrameChunker
  private readonly idField: FieldLayout
  private readonly dataField: FieldLayout

  protected constructor(protected readonly format: F, unitBits: number) {
    this.layout = layoutFrame(format.headerOrder, format.headerLen, unitBits)
    this.chunker = new FrameChunker(this.layout.frameBits)
    const idField = this.layout.fields.find((f) => f.header === 'ID')
    const dataField = this.layout.fields.find((f) => f.header === 'DATA')
    if (!idField || !dataField) {
      throw new Error('frame format needs an ID and a DATA field')
    }
    this.idField = idField
    this.dataField = dataField
  }

  decode(chunk: Uint8Array): DecodeResult {
    const result: DecodeResult = { packets: [], dropped: [] }
    for (const frame of this.chunker.feed(chunk)) {
      const id = renderHexId(fieldValue(frame, this.idField), this.idField.bits)
      if (!this.format.packetIds.has(id)) {
        result.dropped.push({ kind: 'resync', reason: 'unknown-id', detail: `frame with unlisted id ${id}` })
        continue
      }
      result.packets.push({ id, value: toFieldValue(fieldValue(frame, this.dataField), this.dataField.bits) })
    }
    return result
  }

  /** Bits received that do not complete a frame yet. */
  get pendingBits(): number {
    return this.chunker.pendingBits
  }

  reset(): void {
    this.chunker.reset()
  }
}

/** Type 2: header lengths are counted in bytes. */
export class ByteFrameDecoder extends FieldFrameDecoder<ByteFrameFormat> {
  readonly type = 2
  readonly name = 'Encoded chars'

  constructor(format: ByteFrameFormat) {
    super(format, 8)
  }
}

/** Type 3: header lengths are counted in bits. */
export class BitFrameDecoder extends FieldFrameDecoder<BitFrameFormat> {
  readonly type = 3
  readonly name = 'Encoded bits'

  constructor(format: BitFrameFormat) {
    super(format, 1)
  }
}
