import type { DecodeResult, HumanReadableFormat, PacketDecoder } from '../types'
import { DelimitedSplitter, splitOnFirst } from '../streamSplitter'

function scrub(text: string, ignore: readonly string[]): string {
  let result = text
  for (const entry of ignore) {
    result = result.split(entry).join('')
  }
  return result
}

/**
 * Type 0: lines of text such as `motor speed: 200 rpm`. Every fragment stands
 * on its own; an unknown id only costs that fragment.
 */
export class HumanReadableDecoder implements PacketDecoder {
  readonly type = 0
  readonly name = 'Human readable'
  private readonly splitter: DelimitedSplitter

  constructor(private readonly format: HumanReadableFormat, maxFragmentLength?: number) {
    this.splitter = new DelimitedSplitter(format.packetDelimiters, maxFragmentLength)
  }

  decode(chunk: Uint8Array): DecodeResult {
    const result: DecodeResult = { packets: [], dropped: [] }
    const { fragments, overflowed } = this.splitter.feed(chunk)
    if (overflowed > 0) {
      result.dropped.push({ kind: 'resync', reason: 'overflow', detail: `discarded ${overflowed} characters without a packet delimiter` })
    }

    for (const fragment of fragments) {
      const split = splitOnFirst(fragment, this.format.dataDelimiters)
      const [idPart, dataPart] = split ?? [fragment, '']
      if (!this.format.packetIds.has(idPart)) {
        result.dropped.push({ kind: 'resync', reason: 'unknown-id', detail: `unmatched fragment ${JSON.stringify(fragment)}` })
        continue
      }
      result.packets.push({ id: idPart, value: scrub(dataPart, this.format.ignore) })
    }
    return result
  }

  reset(): void {
    this.splitter.reset()
  }
}
