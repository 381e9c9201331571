import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { loadPacketConfig, parsePacketConfig, readPacketConfig } from '../packetConfig'
import { ConfigError } from '../../lib/decoder/errors'
import { PacketSession } from '../../lib/session/session'

const configPath = (name: string) => fileURLToPath(new URL(`../../../configs/${name}`, import.meta.url))
const encoder = new TextEncoder()

function violationPaths(run: () => unknown): string[] {
  try {
    run()
  } catch (err) {
    if (err instanceof ConfigError) return err.violations.map((v) => v.path)
    throw err
  }
  throw new Error('expected a ConfigError')
}

describe('loadPacketConfig', () => {
  it('loads the human readable example', async () => {
    const config = await loadPacketConfig(configPath('type0-analog-in-out.json'))
    expect(config.title).toBe('Type 0 Example')
    expect(config.exampleLine).toBe('sensor = <VAL>\toutput = <VAL>\r\n')

    const session = new PacketSession(config.format)
    const result = session.feed(encoder.encode('sensor = 512\toutput = 127\r\n'))
    expect(result?.packets.map((p) => [p.id, p.value])).toEqual([['output', '127']])
  })

  it('loads the compressed CSV example', async () => {
    const config = await loadPacketConfig(configPath('type1-compressed-csv.json'))
    const session = new PacketSession(config.format)
    const result = session.feed(encoder.encode('id:0x632;data:0x88;id:0x45;data:1;'))
    expect(result?.packets.map((p) => p.id)).toEqual(['0x632', '0x45'])
    expect(result?.samples).toEqual([{ seriesId: '0x632', x: 0, y: '0x88' }])
  })

  it('loads the encoded chars example', async () => {
    const config = await loadPacketConfig(configPath('type2-encoded-chars.json'))
    expect(config.format.type).toBe(2)
    expect([...config.format.packetIds]).toEqual(['0x432000'])
  })

  it('canonicalises ids in the encoded bits example', async () => {
    const config = await loadPacketConfig(configPath('type3-encoded-bits.json'))
    expect([...config.format.packetIds]).toEqual(['0x1'])
    expect(config.format.graphDefinitions.get('light')?.y).toEqual({ packetId: '0x1', yAxis: 'Lux' })
  })

  it('rejects when the file is missing', async () => {
    await expect(loadPacketConfig(configPath('missing.json'))).rejects.toMatchObject({ code: 'ENOENT' })
  })
})

describe('parsePacketConfig', () => {
  it('reports invalid JSON at the document root', () => {
    try {
      parsePacketConfig('{')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (!(err instanceof ConfigError)) return
      expect(err.violations).toHaveLength(1)
      expect(err.violations[0].path).toBe('$')
      expect(err.violations[0].message).toMatch(/^invalid JSON: /)
    }
  })

  it('prefixes violations with the packet_format path', () => {
    expect(violationPaths(() => parsePacketConfig(JSON.stringify({ packet_format: { type: 0 } }))))
      .toEqual(['packet_format.packet_delimiters', 'packet_format.packet_ids'])
    expect(violationPaths(() => parsePacketConfig(JSON.stringify({ packet_format: 'none' }))))
      .toEqual(['packet_format'])
  })

  it('lists every violation in the error message', () => {
    const json = JSON.stringify({ packet_format: { type: 0 } })
    expect(() => parsePacketConfig(json)).toThrow(
      'Invalid packet configuration (2 problems):\n'
      + '  packet_format.packet_delimiters: missing mandatory field\n'
      + '  packet_format.packet_ids: missing mandatory field',
    )
  })
})

describe('readPacketConfig', () => {
  it('accepts a bare packet format', () => {
    const config = readPacketConfig({ type: 1, packet_delimiters: [';'], packet_ids: ['temp'], specifiers: ['id', 'data'] })
    expect(config.title).toBeUndefined()
    expect(config.format.type).toBe(1)
  })
})
