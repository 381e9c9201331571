import { describe, it, expect, vi, afterEach } from 'vitest'
import { SeriesRouter } from '../router'
import { validateFormat } from '../../decoder/formatDescriptor'
import { createSeriesStore } from '../../../stores/seriesStore'
import type { PacketValue, ParsedPacket } from '../../decoder/types'

function packet(id: string, value: PacketValue, parseTime = 0n): ParsedPacket {
  return { id, value, text: `${id}: ${String(value)}`, parseTime, sequenceIndex: 0 }
}

function router(graphs: Record<string, unknown>, packetIds = ['temp', 'tick'], maxWaiting?: number) {
  const format = validateFormat({
    type: 0,
    packet_delimiters: ['\n'],
    packet_ids: packetIds,
    graph_definitions: graphs,
  })
  const store = createSeriesStore()
  return { router: new SeriesRouter(format.graphDefinitions, store, maxWaiting), store }
}

describe('SeriesRouter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('numbers samples in index mode', () => {
    const { router: r } = router({ s: { y: { packet_id: 'temp' } } })
    const samples = r.routeAll([packet('temp', '1'), packet('temp', '2'), packet('temp', '3')])
    expect(samples.map((s) => s.x)).toEqual([0, 1, 2])
  })

  it('keeps time x values strictly increasing', () => {
    const { router: r } = router({ s: { x: { use_time: true }, y: { packet_id: 'temp' } } })
    const same = Array.from({ length: 5 }, (_, i) => packet('temp', String(i), 1000n))
    expect(r.routeAll(same).map((s) => s.x)).toEqual([1000n, 1001n, 1002n, 1003n, 1004n])
  })

  it('uses the parse time when it is already ahead', () => {
    const { router: r } = router({ s: { x: { use_time: true }, y: { packet_id: 'temp' } } })
    const samples = r.routeAll([packet('temp', 'a', 10n), packet('temp', 'b', 10n), packet('temp', 'c', 11n), packet('temp', 'd', 50n)])
    expect(samples.map((s) => s.x)).toEqual([10n, 11n, 12n, 50n])
  })

  it('pairs inline samples with the latest index value', () => {
    const { router: r } = router({ s: { x: { packet_id: 'tick' }, y: { packet_id: 'temp' } } })
    expect(r.route(packet('temp', '1'))).toEqual([])
    expect(r.route(packet('tick', '5'))).toEqual([{ seriesId: 's', x: '5', y: '1' }])
    expect(r.route(packet('temp', '2'))).toEqual([{ seriesId: 's', x: '5', y: '2' }])
    expect(r.route(packet('tick', '6'))).toEqual([])
    expect(r.route(packet('temp', '3'))).toEqual([{ seriesId: 's', x: '6', y: '3' }])
  })

  it('keeps only the newest inline samples while the index packet is missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { router: r } = router({ s: { x: { packet_id: 'tick' }, y: { packet_id: 'temp' } } }, ['temp', 'tick'], 2)
    r.routeAll([packet('temp', '1'), packet('temp', '2'), packet('temp', '3'), packet('temp', '4')])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('[SeriesRouter] series s has no tick value yet; keeping only the latest 2 samples')
    expect(r.route(packet('tick', '9'))).toEqual([
      { seriesId: 's', x: '9', y: '3' },
      { seriesId: 's', x: '9', y: '4' },
    ])
  })

  it('uses the packet value as x when a series indexes itself', () => {
    const { router: r } = router({ s: { x: { packet_id: 'temp' }, y: { packet_id: 'temp' } } })
    expect(r.route(packet('temp', '7'))).toEqual([{ seriesId: 's', x: '7', y: '7' }])
  })

  it('feeds every series that plots a packet id', () => {
    const { router: r, store } = router({
      byIndex: { y: { packet_id: 'temp' } },
      byTime: { x: { use_time: true }, y: { packet_id: 'temp' } },
    })
    expect(r.route(packet('temp', '9', 3n))).toEqual([
      { seriesId: 'byIndex', x: 0, y: '9' },
      { seriesId: 'byTime', x: 3n, y: '9' },
    ])
    expect(store.getState().seriesIds()).toEqual(['byIndex', 'byTime'])
  })

  it('opens a series on its first packet and appends to the store', () => {
    const { router: r, store } = router({ s: { title: 'Temp', y: { packet_id: 'temp', y_axis: 'C' } } })
    expect(store.getState().seriesIds()).toEqual([])
    r.route(packet('tick', '1'))
    expect(store.getState().seriesIds()).toEqual([])
    r.routeAll([packet('temp', '1'), packet('temp', '2')])
    const series = store.getState().series.get('s')
    expect(series).toEqual({
      id: 's',
      title: 'Temp',
      xAxisLabel: 'Packet Idx',
      yAxisLabel: 'C',
      mode: 'index',
      samples: [{ x: 0, y: '1' }, { x: 1, y: '2' }],
      version: 1,
    })
  })

  it('starts over after reset', () => {
    const { router: r, store } = router({ s: { y: { packet_id: 'temp' } } })
    r.route(packet('temp', '1'))
    r.reset()
    expect(store.getState().seriesIds()).toEqual([])
    expect(r.route(packet('temp', '2'))).toEqual([{ seriesId: 's', x: 0, y: '2' }])
    expect(store.getState().sampleCount('s')).toBe(1)
  })
})
