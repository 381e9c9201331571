import { createStore } from 'zustand/vanilla'
import type { Sample, SeriesSample, XMode } from '../lib/decoder/types'

export interface SeriesInfo {
  id: string
  title: string
  xAxisLabel: string
  yAxisLabel: string
  mode: XMode
}

export interface Series extends SeriesInfo {
  // Shared with the store and appended in place; compare `version` to see growth.
  samples: readonly Sample[]
  version: number
}

interface SeriesState {
  // Data
  series: Map<string, Series>
  totalSamples: number

  // Actions
  openSeries: (info: SeriesInfo) => void
  appendSamples: (batch: readonly SeriesSample[]) => void
  seriesIds: () => string[]
  sampleCount: (seriesId: string) => number
  reset: () => void
}

export type SeriesStore = ReturnType<typeof createSeriesStore>

export function createSeriesStore() {
  // Sample arrays only ever grow, so batches are pushed onto them rather than
  // copied; each append publishes a new Series object with a bumped version.
  const buffers = new Map<string, Sample[]>()

  return createStore<SeriesState>((set, get) => ({
    series: new Map(),
    totalSamples: 0,

    openSeries: (info) => set((state) => {
      if (state.series.has(info.id)) return state
      const samples: Sample[] = []
      buffers.set(info.id, samples)
      const series = new Map(state.series)
      series.set(info.id, { ...info, samples, version: 0 })
      return { series }
    }),

    appendSamples: (batch) => set((state) => {
      if (batch.length === 0) return state
      const grouped = new Map<string, Sample[]>()
      for (const { seriesId, x, y } of batch) {
        const list = grouped.get(seriesId) ?? []
        list.push({ x, y })
        grouped.set(seriesId, list)
      }
      const series = new Map(state.series)
      let added = 0
      for (const [id, samples] of grouped) {
        const current = series.get(id)
        const buffer = buffers.get(id)
        if (!current || !buffer) {
          console.warn(`[seriesStore] dropping ${samples.length} samples for unopened series ${id}`)
          continue
        }
        for (const sample of samples) buffer.push(sample)
        series.set(id, { ...current, version: current.version + 1 })
        added += samples.length
      }
      return { series, totalSamples: state.totalSamples + added }
    }),

    seriesIds: () => [...get().series.keys()],

    sampleCount: (seriesId) => get().series.get(seriesId)?.samples.length ?? 0,

    reset: () => {
      buffers.clear()
      set({ series: new Map(), totalSamples: 0 })
    },
  }))
}
