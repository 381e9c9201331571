import { readFile } from 'node:fs/promises'
import type { FormatDescriptor } from '../lib/decoder/types'
import { ConfigError } from '../lib/decoder/errors'
import { validateFormat } from '../lib/decoder/formatDescriptor'

export interface PacketConfig {
  title?: string
  description?: string
  exampleLine?: string
  format: FormatDescriptor
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalText(doc: Record<string, unknown>, key: string): string | undefined {
  const value = doc[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Builds a packet configuration from a parsed document. Accepts either the
 * full `{ packet_title, packet_description, example_line, packet_format }`
 * wrapper or a bare packet format object.
 */
export function readPacketConfig(document: unknown): PacketConfig {
  if (isRecord(document) && 'packet_format' in document) {
    let format: FormatDescriptor
    try {
      format = validateFormat(document.packet_format)
    } catch (err) {
      if (err instanceof ConfigError) {
        throw new ConfigError(err.violations.map((v) => ({
          path: v.path === '$' ? 'packet_format' : `packet_format.${v.path}`,
          message: v.message,
        })))
      }
      throw err
    }
    return {
      title: optionalText(document, 'packet_title'),
      description: optionalText(document, 'packet_description'),
      exampleLine: optionalText(document, 'example_line'),
      format,
    }
  }
  return { format: validateFormat(document) }
}

export function parsePacketConfig(json: string): PacketConfig {
  let document: unknown
  try {
    document = JSON.parse(json)
  } catch (err) {
    throw new ConfigError([{ path: '$', message: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` }])
  }
  return readPacketConfig(document)
}

export async function loadPacketConfig(path: string): Promise<PacketConfig> {
  return parsePacketConfig(await readFile(path, 'utf-8'))
}
