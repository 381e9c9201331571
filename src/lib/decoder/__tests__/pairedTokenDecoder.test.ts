import { describe, it, expect } from 'vitest'
import { PairedTokenDecoder } from '../builtins/pairedTokenDecoder'
import { validateFormat } from '../formatDescriptor'
import type { PairedTokenFormat } from '../types'

const encoder = new TextEncoder()
const bytes = (text: string) => encoder.encode(text)

function format(packetIds: string[]): PairedTokenFormat {
  const descriptor = validateFormat({
    type: 1,
    packet_delimiters: [';'],
    packet_ids: packetIds,
    specifiers: ['id', 'data'],
  })
  if (descriptor.type !== 1) throw new Error('expected a type 1 descriptor')
  return descriptor
}

describe('PairedTokenDecoder', () => {
  it('pairs id and data tokens and drops unlisted ids', () => {
    const decoder = new PairedTokenDecoder(format(['temp']))
    const result = decoder.decode(bytes('id:temp;data:128;id:light;data:8000;'))
    expect(result.packets).toEqual([{ id: 'temp', value: '128' }])
    expect(result.dropped).toEqual([
      { kind: 'resync', reason: 'unknown-id', detail: 'unlisted id "light"' },
    ])
  })

  it('discards a data token with no pending id', () => {
    const decoder = new PairedTokenDecoder(format(['temp']))
    const result = decoder.decode(bytes('data:5;'))
    expect(result.packets).toEqual([])
    expect(result.dropped.map((d) => d.reason)).toEqual(['unpaired'])
  })

  it('lets a newer id replace the pending one', () => {
    const decoder = new PairedTokenDecoder(format(['a', 'b']))
    const result = decoder.decode(bytes('id:a;id:b;data:1;'))
    expect(result.packets).toEqual([{ id: 'b', value: '1' }])
    expect(result.dropped).toEqual([
      { kind: 'resync', reason: 'unpaired', detail: 'id a replaced before its data arrived' },
    ])
  })

  it('keeps the pending id across chunks', () => {
    const decoder = new PairedTokenDecoder(format(['temp']))
    expect(decoder.decode(bytes('id:temp;')).packets).toEqual([])
    expect(decoder.pending).toBe('temp')
    expect(decoder.decode(bytes('data:7;')).packets).toEqual([{ id: 'temp', value: '7' }])
    expect(decoder.pending).toBeNull()
  })

  it('skips malformed tokens without losing the pending id', () => {
    const decoder = new PairedTokenDecoder(format(['temp']))
    const result = decoder.decode(bytes('id:temp;garbage;crc:9;data:1;'))
    expect(result.packets).toEqual([{ id: 'temp', value: '1' }])
    expect(result.dropped.map((d) => d.reason)).toEqual(['malformed', 'malformed'])
  })

  it('splits a token on its first data delimiter only', () => {
    const decoder = new PairedTokenDecoder(format(['clock']))
    expect(decoder.decode(bytes('id:clock;data:12:30;')).packets).toEqual([{ id: 'clock', value: '12:30' }])
  })

  it('clears the pending id on reset', () => {
    const decoder = new PairedTokenDecoder(format(['temp']))
    decoder.decode(bytes('id:temp;'))
    decoder.reset()
    expect(decoder.pending).toBeNull()
    expect(decoder.decode(bytes('data:7;')).packets).toEqual([])
  })
})
