import type {
  GraphDefinition,
  PacketValue,
  ParsedPacket,
  SampleCoordinate,
  SeriesSample,
} from '../decoder/types'
import type { SeriesStore } from '../../stores/seriesStore'
import { resolveLabels } from './labels'

export const MAX_WAITING_SAMPLES = 8192

interface SeriesCursor {
  def: GraphDefinition
  opened: boolean
  count: number
  lastTime?: bigint
  indexValue?: PacketValue
  waiting: PacketValue[]  // inline samples that arrived before any index value
  warned: boolean
}

function addTo(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key)
  if (list) list.push(value)
  else map.set(key, [value])
}

/**
 * Turns accepted packets into graph samples. Each graph definition is one
 * series; its ordering mode decides the x value:
 *
 * - inline: the latest value of the definition's index packet
 * - time: the packet's parse time, nudged forward 1 ns to stay strictly increasing
 * - index: the number of samples already in the series
 */
export class SeriesRouter {
  private readonly byDataId = new Map<string, string[]>()
  private readonly byIndexId = new Map<string, string[]>()
  private cursors: Map<string, SeriesCursor>

  constructor(
    private readonly definitions: ReadonlyMap<string, GraphDefinition>,
    private readonly store: SeriesStore,
    private readonly maxWaiting = MAX_WAITING_SAMPLES,
  ) {
    for (const [seriesId, def] of definitions) {
      addTo(this.byDataId, def.y.packetId, seriesId)
      if (def.x.mode === 'inline' && def.x.packetId !== undefined && def.x.packetId !== def.y.packetId) {
        addTo(this.byIndexId, def.x.packetId, seriesId)
      }
    }
    this.cursors = this.freshCursors()
  }

  route(packet: ParsedPacket): SeriesSample[] {
    return this.routeAll([packet])
  }

  /** Routes packets in order and appends the resulting samples to the store in one update. */
  routeAll(packets: readonly ParsedPacket[]): SeriesSample[] {
    const samples: SeriesSample[] = []
    for (const packet of packets) {
      for (const seriesId of this.byIndexId.get(packet.id) ?? []) {
        this.updateIndex(seriesId, packet.value, samples)
      }
      for (const seriesId of this.byDataId.get(packet.id) ?? []) {
        this.addSample(seriesId, packet, samples)
      }
    }
    if (samples.length > 0) this.store.getState().appendSamples(samples)
    return samples
  }

  reset(): void {
    this.cursors = this.freshCursors()
    this.store.getState().reset()
  }

  private freshCursors(): Map<string, SeriesCursor> {
    const cursors = new Map<string, SeriesCursor>()
    for (const [seriesId, def] of this.definitions) {
      cursors.set(seriesId, { def, opened: false, count: 0, waiting: [], warned: false })
    }
    return cursors
  }

  private cursor(seriesId: string): SeriesCursor {
    const cursor = this.cursors.get(seriesId)
    if (!cursor) throw new Error(`no graph definition for series ${seriesId}`)
    return cursor
  }

  private open(seriesId: string, cursor: SeriesCursor): void {
    if (cursor.opened) return
    const labels = resolveLabels(cursor.def)
    this.store.getState().openSeries({
      id: seriesId,
      title: labels.title,
      xAxisLabel: labels.xAxis,
      yAxisLabel: labels.yAxis,
      mode: cursor.def.x.mode,
    })
    cursor.opened = true
  }

  private push(seriesId: string, cursor: SeriesCursor, x: SampleCoordinate, y: PacketValue, out: SeriesSample[]): void {
    out.push({ seriesId, x, y })
    cursor.count++
  }

  private updateIndex(seriesId: string, value: PacketValue, out: SeriesSample[]): void {
    const cursor = this.cursor(seriesId)
    cursor.indexValue = value
    if (cursor.waiting.length > 0) {
      for (const y of cursor.waiting) this.push(seriesId, cursor, value, y, out)
      cursor.waiting = []
    }
  }

  // Keeps the newest samples once the index packet is overdue.
  private wait(seriesId: string, cursor: SeriesCursor, value: PacketValue): void {
    cursor.waiting.push(value)
    if (cursor.waiting.length <= this.maxWaiting) return
    cursor.waiting.shift()
    if (!cursor.warned) {
      cursor.warned = true
      console.warn(`[SeriesRouter] series ${seriesId} has no ${cursor.def.x.packetId} value yet; keeping only the latest ${this.maxWaiting} samples`)
    }
  }

  private addSample(seriesId: string, packet: ParsedPacket, out: SeriesSample[]): void {
    const cursor = this.cursor(seriesId)
    const { def } = cursor
    this.open(seriesId, cursor)

    switch (def.x.mode) {
      case 'inline': {
        if (def.x.packetId === packet.id) {
          this.push(seriesId, cursor, packet.value, packet.value, out)
        } else if (cursor.indexValue !== undefined) {
          this.push(seriesId, cursor, cursor.indexValue, packet.value, out)
        } else {
          this.wait(seriesId, cursor, packet.value)
        }
        return
      }
      case 'time': {
        let x = packet.parseTime
        if (cursor.lastTime !== undefined && x <= cursor.lastTime) {
          x = cursor.lastTime + 1n
        }
        cursor.lastTime = x
        this.push(seriesId, cursor, x, packet.value, out)
        return
      }
      case 'index':
        this.push(seriesId, cursor, cursor.count, packet.value, out)
        return
    }
  }
}
