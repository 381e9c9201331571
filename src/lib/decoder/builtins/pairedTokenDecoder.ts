import type { DecodeResult, PacketDecoder, PairedTokenFormat } from '../types'
import { DelimitedSplitter, splitOnFirst } from '../streamSplitter'

/**
 * Type 1: alternating `id:<name>` / `data:<value>` tokens. Only one id waits
 * for its data token at a time; a newer id replaces it.
 */
export class PairedTokenDecoder implements PacketDecoder {
  readonly type = 1
  readonly name = 'Compressed CSV'
  private readonly splitter: DelimitedSplitter
  private pendingId: string | null = null

  constructor(private readonly format: PairedTokenFormat, maxFragmentLength?: number) {
    this.splitter = new DelimitedSplitter(format.packetDelimiters, maxFragmentLength)
  }

  get pending(): string | null {
    return this.pendingId
  }

  decode(chunk: Uint8Array): DecodeResult {
    const result: DecodeResult = { packets: [], dropped: [] }
    const [idSpecifier, dataSpecifier] = this.format.specifiers
    const { fragments, overflowed } = this.splitter.feed(chunk)
    if (overflowed > 0) {
      result.dropped.push({ kind: 'resync', reason: 'overflow', detail: `discarded ${overflowed} characters without a packet delimiter` })
    }

    for (const token of fragments) {
      const split = splitOnFirst(token, this.format.dataDelimiters)
      if (!split) {
        result.dropped.push({ kind: 'resync', reason: 'malformed', detail: `token ${JSON.stringify(token)} has no data delimiter` })
        continue
      }
      const [specifier, value] = split

      if (specifier === idSpecifier) {
        if (this.pendingId !== null) {
          result.dropped.push({ kind: 'resync', reason: 'unpaired', detail: `id ${this.pendingId} replaced before its data arrived` })
        }
        this.pendingId = value
      } else if (specifier === dataSpecifier) {
        if (this.pendingId === null) {
          result.dropped.push({ kind: 'resync', reason: 'unpaired', detail: `data ${JSON.stringify(value)} without a preceding id` })
          continue
        }
        const id = this.pendingId
        this.pendingId = null
        if (!this.format.packetIds.has(id)) {
          result.dropped.push({ kind: 'resync', reason: 'unknown-id', detail: `unlisted id ${JSON.stringify(id)}` })
          continue
        }
        result.packets.push({ id, value })
      } else {
        result.dropped.push({ kind: 'resync', reason: 'malformed', detail: `unknown specifier ${JSON.stringify(specifier)}` })
      }
    }
    return result
  }

  reset(): void {
    this.splitter.reset()
    this.pendingId = null
  }
}
