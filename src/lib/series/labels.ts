import type { GraphDefinition, XMode } from '../decoder/types'

export const UNDEFINED_LABEL = 'undefined'
export const TIME_AXIS_LABEL = 'Time (ns)'
export const INDEX_AXIS_LABEL = 'Packet Idx'

export interface SeriesLabels {
  title: string
  xAxis: string
  yAxis: string
}

function defaultXLabel(mode: XMode, indexPacketId: string | undefined): string {
  switch (mode) {
    case 'inline':
      return indexPacketId ?? UNDEFINED_LABEL
    case 'time':
      return TIME_AXIS_LABEL
    case 'index':
      return INDEX_AXIS_LABEL
  }
}

export function resolveLabels(def: GraphDefinition): SeriesLabels {
  return {
    title: def.title ?? UNDEFINED_LABEL,
    xAxis: def.x.xAxis ?? defaultXLabel(def.x.mode, def.x.packetId),
    yAxis: def.y.yAxis ?? UNDEFINED_LABEL,
  }
}
