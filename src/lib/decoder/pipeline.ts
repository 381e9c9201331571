import type {
  DropRecord,
  PacketDecoder,
  PacketValue,
  ParsedPacket,
  SeriesSample,
} from './types'
import type { FilterStage } from './filter'
import type { SeriesRouter } from '../series/router'
import { formatPacketValue } from './builtins/fieldFormat'

export type Clock = () => bigint

export const monotonicClock: Clock = () => process.hrtime.bigint()

/** Stamps accepted packets with their parse time and running sequence index. */
export class PacketStamper {
  private next = 0

  constructor(private readonly clock: Clock = monotonicClock) {}

  stamp(id: string, value: PacketValue): ParsedPacket {
    return Object.freeze({
      id,
      value,
      text: `${id}: ${formatPacketValue(value)}`,
      parseTime: this.clock(),
      sequenceIndex: this.next++,
    })
  }

  reset(): void {
    this.next = 0
  }
}

export interface PipelineStages {
  decoder: PacketDecoder
  filter: FilterStage
  stamper: PacketStamper
  router: SeriesRouter
}

export interface ChunkResult {
  packets: ParsedPacket[]
  samples: SeriesSample[]
  dropped: DropRecord[]
}

/** Runs one chunk through decode → filter → route. */
export function processChunk(chunk: Uint8Array, stages: PipelineStages): ChunkResult {
  const decoded = stages.decoder.decode(chunk)
  const dropped = [...decoded.dropped]
  const packets: ParsedPacket[] = []

  for (const candidate of decoded.packets) {
    const outcome = stages.filter.apply(candidate)
    if (!outcome.accepted) {
      dropped.push(outcome.drop)
      continue
    }
    packets.push(stages.stamper.stamp(candidate.id, outcome.value))
  }

  const samples = stages.router.routeAll(packets)
  return { packets, samples, dropped }
}
