import { describe, it, expect } from 'vitest'
import { HumanReadableDecoder } from '../builtins/humanReadableDecoder'
import { validateFormat } from '../formatDescriptor'
import type { HumanReadableFormat } from '../types'

const encoder = new TextEncoder()
const bytes = (text: string) => encoder.encode(text)

function format(overrides: Record<string, unknown> = {}): HumanReadableFormat {
  const descriptor = validateFormat({
    type: 0,
    packet_delimiters: ['\n'],
    packet_ids: ['motor speed'],
    data_delimiters: [': '],
    ignore: [' rpm'],
    ...overrides,
  })
  if (descriptor.type !== 0) throw new Error('expected a type 0 descriptor')
  return descriptor
}

describe('HumanReadableDecoder', () => {
  it('decodes listed lines and skips unknown ones', () => {
    const decoder = new HumanReadableDecoder(format())
    const result = decoder.decode(bytes('motor speed: 200 rpm\nhello world\nmotor speed: 199 rpm\n'))
    expect(result.packets).toEqual([
      { id: 'motor speed', value: '200' },
      { id: 'motor speed', value: '199' },
    ])
    expect(result.dropped).toEqual([
      { kind: 'resync', reason: 'unknown-id', detail: 'unmatched fragment "hello world"' },
    ])
  })

  it('joins a packet split across chunks', () => {
    const decoder = new HumanReadableDecoder(format())
    expect(decoder.decode(bytes('motor speed: 2')).packets).toEqual([])
    expect(decoder.decode(bytes('00 rpm\n')).packets).toEqual([{ id: 'motor speed', value: '200' }])
  })

  it('matches the id exactly', () => {
    const decoder = new HumanReadableDecoder(format())
    const result = decoder.decode(bytes('motor speed 2: 5\n'))
    expect(result.packets).toEqual([])
    expect(result.dropped).toHaveLength(1)
  })

  it('uses the whole fragment as id when no data delimiter is present', () => {
    const decoder = new HumanReadableDecoder(format({ packet_ids: ['ping'], data_delimiters: [] }))
    expect(decoder.decode(bytes('ping\n')).packets).toEqual([{ id: 'ping', value: '' }])
  })

  it('removes ignore strings from the data in list order', () => {
    const decoder = new HumanReadableDecoder(format({ packet_ids: ['k'], data_delimiters: ['='], ignore: ['ab', 'b'] }))
    expect(decoder.decode(bytes('k=aabb\n')).packets).toEqual([{ id: 'k', value: 'a' }])
  })

  it('reports an overflowing fragment and recovers at the next delimiter', () => {
    const decoder = new HumanReadableDecoder(format(), 8)
    const first = decoder.decode(bytes('xxxxxxxxxxxx'))
    expect(first.dropped).toEqual([
      { kind: 'resync', reason: 'overflow', detail: 'discarded 12 characters without a packet delimiter' },
    ])
    expect(decoder.decode(bytes('\nmotor speed: 7 rpm\n')).packets).toEqual([{ id: 'motor speed', value: '7' }])
  })
})
