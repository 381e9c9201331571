export * from './lib/decoder'
export { SeriesRouter, MAX_WAITING_SAMPLES } from './lib/series/router'
export { resolveLabels, INDEX_AXIS_LABEL, TIME_AXIS_LABEL, UNDEFINED_LABEL } from './lib/series/labels'
export { PacketSession } from './lib/session/session'
export { SampleChannel, DEFAULT_CHANNEL_CAPACITY } from './lib/session/sampleChannel'
export { createSeriesStore } from './stores/seriesStore'
export { loadPacketConfig, parsePacketConfig, readPacketConfig } from './config/packetConfig'
export type { SeriesLabels } from './lib/series/labels'
export type { SessionOptions, SessionStats } from './lib/session/session'
export type { Series, SeriesInfo, SeriesStore } from './stores/seriesStore'
export type { PacketConfig } from './config/packetConfig'
