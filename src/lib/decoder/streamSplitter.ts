// Chunkers shared by the decoders. Both keep whatever trails the last complete
// fragment/frame and pick it up again on the next feed().

export const DEFAULT_MAX_FRAGMENT_LENGTH = 4096

export interface DelimitedSplit {
  fragments: string[]
  /** Characters discarded because a fragment outgrew maxFragmentLength. */
  overflowed: number
}

/**
 * Splits a UTF-8 byte stream on a set of delimiter strings. At any position
 * the longest delimiter is tried first, so `\r\n` wins over `\r`.
 */
export class DelimitedSplitter {
  private readonly delimiters: string[]
  private readonly maxFragmentLength: number
  private decoder = new TextDecoder('utf-8')
  private buffer = ''
  private scanFrom = 0

  constructor(delimiters: readonly string[], maxFragmentLength = DEFAULT_MAX_FRAGMENT_LENGTH) {
    this.delimiters = [...new Set(delimiters)]
      .filter((d) => d.length > 0)
      .sort((a, b) => b.length - a.length)
    this.maxFragmentLength = maxFragmentLength
  }

  feed(chunk: Uint8Array): DelimitedSplit {
    return this.feedText(this.decoder.decode(chunk, { stream: true }))
  }

  feedText(text: string): DelimitedSplit {
    this.buffer += text
    const fragments: string[] = []
    let overflowed = 0
    let start = 0
    let i = this.scanFrom

    scan:
    while (i < this.buffer.length) {
      for (const delim of this.delimiters) {
        if (this.buffer.startsWith(delim, i)) {
          fragments.push(this.buffer.slice(start, i))
          i += delim.length
          start = i
          continue scan
        }
        // The tail may still grow into this delimiter; wait for more input.
        if (this.buffer.length - i < delim.length && delim.startsWith(this.buffer.slice(i))) {
          break scan
        }
      }
      i++
    }

    this.buffer = this.buffer.slice(start)
    this.scanFrom = i - start
    if (this.scanFrom > this.maxFragmentLength) {
      overflowed = this.scanFrom
      this.buffer = this.buffer.slice(this.scanFrom)
      this.scanFrom = 0
    }
    return { fragments, overflowed }
  }

  /** Text received but not yet terminated by a delimiter. */
  get pending(): string {
    return this.buffer
  }

  reset(): void {
    this.decoder = new TextDecoder('utf-8')
    this.buffer = ''
    this.scanFrom = 0
  }
}

/**
 * Cuts a byte stream into frames of a fixed number of bits. Frames need not be
 * byte aligned; a partially consumed byte carries over to the next frame.
 * Each frame is returned as an unsigned big-endian integer.
 */
export class FrameChunker {
  readonly frameBits: number
  private buffer = new Uint8Array(0)
  private bitOffset = 0  // bits of buffer[0] already consumed

  constructor(frameBits: number) {
    if (!Number.isInteger(frameBits) || frameBits < 1) {
      throw new RangeError(`frame length must be a positive number of bits, got ${frameBits}`)
    }
    this.frameBits = frameBits
  }

  feed(chunk: Uint8Array): bigint[] {
    if (chunk.length > 0) {
      const joined = new Uint8Array(this.buffer.length + chunk.length)
      joined.set(this.buffer, 0)
      joined.set(chunk, this.buffer.length)
      this.buffer = joined
    }

    const frames: bigint[] = []
    let byteIndex = 0
    let bitIndex = this.bitOffset
    while ((this.buffer.length - byteIndex) * 8 - bitIndex >= this.frameBits) {
      let value = 0n
      let remaining = this.frameBits
      while (remaining > 0) {
        const available = 8 - bitIndex
        const take = Math.min(available, remaining)
        const bits = (this.buffer[byteIndex] >> (available - take)) & ((1 << take) - 1)
        value = (value << BigInt(take)) | BigInt(bits)
        remaining -= take
        bitIndex += take
        if (bitIndex === 8) {
          bitIndex = 0
          byteIndex++
        }
      }
      frames.push(value)
    }

    this.buffer = this.buffer.slice(byteIndex)
    this.bitOffset = bitIndex
    return frames
  }

  /** Bits held back because they do not make up a whole frame yet. */
  get pendingBits(): number {
    return this.buffer.length * 8 - this.bitOffset
  }

  reset(): void {
    this.buffer = new Uint8Array(0)
    this.bitOffset = 0
  }
}

/**
 * Splits `text` at the earliest occurrence of any delimiter (the longest one
 * when several start at the same index). Returns null when none occurs.
 */
export function splitOnFirst(text: string, delimiters: readonly string[]): [string, string] | null {
  let at = -1
  let length = 0
  for (const delim of delimiters) {
    if (delim.length === 0) continue
    const idx = text.indexOf(delim)
    if (idx === -1) continue
    if (at === -1 || idx < at || (idx === at && delim.length > length)) {
      at = idx
      length = delim.length
    }
  }
  return at === -1 ? null : [text.slice(0, at), text.slice(at + length)]
}
