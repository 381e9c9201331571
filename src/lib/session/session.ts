import type {
  DropRecord,
  FilterReason,
  FormatDescriptor,
  ParsedPacket,
  ResyncReason,
  SeriesSample,
} from '../decoder/types'
import { createDecoder, type DecoderOptions } from '../decoder/registry'
import { createFilterStage } from '../decoder/filter'
import { validateFormat } from '../decoder/formatDescriptor'
import { PacketStamper, processChunk, type ChunkResult, type Clock, type PipelineStages } from '../decoder/pipeline'
import { SeriesRouter } from '../series/router'
import { createSeriesStore, type SeriesStore } from '../../stores/seriesStore'
import { DEFAULT_CHANNEL_CAPACITY, SampleChannel } from './sampleChannel'

export interface SessionOptions extends DecoderOptions {
  /** Source of packet parse times in nanoseconds. Defaults to process.hrtime. */
  clock?: Clock
  /** Soft size of the sample and packet channels before they start growing. */
  channelCapacity?: number
  /** Called for every fragment, frame or packet that is dropped. */
  onDrop?: (drop: DropRecord) => void
}

export interface SessionStats {
  bytesReceived: number
  chunksReceived: number
  packetsEmitted: number
  samplesEmitted: number
  dropped: Record<ResyncReason | FilterReason, number>
}

function emptyStats(): SessionStats {
  return {
    bytesReceived: 0,
    chunksReceived: 0,
    packetsEmitted: 0,
    samplesEmitted: 0,
    dropped: {
      'unknown-id': 0,
      malformed: 0,
      unpaired: 0,
      overflow: 0,
      'not-listed': 0,
      rejected: 0,
      error: 0,
    },
  }
}

/**
 * One serial connection's worth of decoding. Bytes go in through feed() or
 * run(); accepted packets and graph samples come out of the `packets` and
 * `samples` channels and the series store.
 *
 * A session never outlives its connection: reconnecting means creating a new
 * session. Loading another packet format mid-connection goes through reload(),
 * which swaps the format and throws away all decoder and series state at once.
 */
export class PacketSession {
  readonly store: SeriesStore = createSeriesStore()
  readonly samples: SampleChannel<SeriesSample>
  readonly packets: SampleChannel<ParsedPacket>
  private descriptor: FormatDescriptor
  private stages: PipelineStages
  private readonly stamper: PacketStamper
  private readonly options: SessionOptions
  private _stats = emptyStats()
  private closed = false
  private resolveClosed: () => void = () => {}
  private readonly whenClosed = new Promise<null>((resolve) => {
    this.resolveClosed = () => resolve(null)
  })

  constructor(descriptor: FormatDescriptor, options: SessionOptions = {}) {
    this.options = options
    const capacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY
    this.samples = new SampleChannel('samples', capacity)
    this.packets = new SampleChannel('packets', capacity)
    this.stamper = new PacketStamper(options.clock)
    this.descriptor = descriptor
    this.stages = this.buildStages(descriptor)
  }

  get format(): FormatDescriptor {
    return this.descriptor
  }

  get isClosed(): boolean {
    return this.closed
  }

  get stats(): SessionStats {
    return { ...this._stats, dropped: { ...this._stats.dropped } }
  }

  /** Decodes one chunk. Returns null once the session is closed. */
  feed(chunk: Uint8Array): ChunkResult | null {
    if (this.closed) return null
    this._stats.bytesReceived += chunk.length
    this._stats.chunksReceived++

    const result = processChunk(chunk, this.stages)
    this._stats.packetsEmitted += result.packets.length
    this._stats.samplesEmitted += result.samples.length
    this.packets.pushAll(result.packets)
    this.samples.pushAll(result.samples)
    for (const drop of result.dropped) {
      this._stats.dropped[drop.reason]++
      this.reportDrop(drop)
    }
    return result
  }

  /**
   * Feeds chunks from `source` until it ends, the session is closed, or
   * `signal` aborts. Aborting closes the session.
   */
  async run(source: AsyncIterable<Uint8Array>, signal?: AbortSignal): Promise<void> {
    const onAbort = () => this.close()
    if (signal?.aborted) {
      this.close()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    const iterator = source[Symbol.asyncIterator]()
    let exhausted = false
    try {
      // A silent source leaves next() pending; closing must not wait on it.
      while (!this.closed) {
        const result = await Promise.race([iterator.next(), this.whenClosed])
        if (result === null) break
        if (result.done) {
          exhausted = true
          break
        }
        this.feed(result.value)
      }
    } finally {
      signal?.removeEventListener('abort', onAbort)
      if (!exhausted) {
        iterator.return?.().catch((err: unknown) => {
          console.error('[PacketSession] source failed to shut down:', err)
        })
      }
    }
  }

  /**
   * Replaces the packet format. The document is validated first; when it is
   * rejected the current format and state stay untouched and the ConfigError
   * is rethrown.
   */
  reload(document: unknown): FormatDescriptor {
    let descriptor: FormatDescriptor
    try {
      descriptor = validateFormat(document)
    } catch (err) {
      console.error('[PacketSession] packet configuration rejected, keeping the current one:', err)
      throw err
    }
    this.replaceFormat(descriptor)
    return descriptor
  }

  replaceFormat(descriptor: FormatDescriptor): void {
    this.stages.decoder.reset()
    this.stages.router.reset()
    this.stamper.reset()
    this.descriptor = descriptor
    this.stages = this.buildStages(descriptor)
  }

  /** Disconnect: stops decoding immediately and drops any buffered input. */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.resolveClosed()
    this.stages.decoder.reset()
    this.stages.router.reset()
    this.packets.close()
    this.samples.close()
  }

  private reportDrop(drop: DropRecord): void {
    try {
      this.options.onDrop?.(drop)
    } catch (err) {
      console.error('[PacketSession] onDrop hook failed:', err)
    }
  }

  private buildStages(descriptor: FormatDescriptor): PipelineStages {
    return {
      decoder: createDecoder(descriptor, { maxFragmentLength: this.options.maxFragmentLength }),
      filter: createFilterStage(descriptor),
      stamper: this.stamper,
      router: new SeriesRouter(descriptor.graphDefinitions, this.store),
    }
  }
}
