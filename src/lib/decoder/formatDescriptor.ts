import type {
  FormatDescriptor,
  GraphDefinition,
  HeaderField,
  PacketFilter,
  PacketType,
} from './types'
import { ConfigError, type ConfigViolation } from './errors'
import { compileFilter } from './filter'
import { fitsInBits, parseIntegerId, renderHexId } from './builtins/fieldFormat'

type Doc = Record<string, unknown>

const PACKET_TYPES: readonly PacketType[] = [0, 1, 2, 3]

const COMMON_OPTIONAL = ['graph_definitions', 'filter_function']

const FIELDS_BY_TYPE: Record<PacketType, { mandatory: string[]; optional: string[] }> = {
  0: { mandatory: ['packet_delimiters', 'packet_ids'], optional: ['data_delimiters', 'ignore', ...COMMON_OPTIONAL] },
  1: { mandatory: ['packet_delimiters', 'packet_ids', 'specifiers'], optional: ['data_delimiters', ...COMMON_OPTIONAL] },
  2: { mandatory: ['header_order', 'header_len', 'packet_ids'], optional: COMMON_OPTIONAL },
  3: { mandatory: ['header_order', 'header_len', 'packet_ids'], optional: COMMON_OPTIONAL },
}

const FORMAT_FIELDS = new Set(
  Object.values(FIELDS_BY_TYPE).flatMap((f) => [...f.mandatory, ...f.optional]),
)

const DEFAULT_PAIR_DATA_DELIMITERS = [':']

function isRecord(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isPacketType(value: unknown): value is PacketType {
  return PACKET_TYPES.some((t) => t === value)
}

function isPacketFilter(value: unknown): value is PacketFilter {
  return typeof value === 'function'
}

class Violations {
  readonly list: ConfigViolation[] = []

  report(path: string, message: string): void {
    this.list.push({ path, message })
  }

  get empty(): boolean {
    return this.list.length === 0
  }
}

function readStringList(
  doc: Doc,
  key: string,
  out: Violations,
  opts: { nonEmptyList?: boolean; nonEmptyEntries?: boolean } = {},
): string[] | undefined {
  const raw = doc[key]
  if (raw === undefined) return undefined
  if (!Array.isArray(raw)) {
    out.report(key, 'expected a list of strings')
    return undefined
  }
  if (opts.nonEmptyList && raw.length === 0) {
    out.report(key, 'must not be empty')
  }
  const result: string[] = []
  raw.forEach((entry: unknown, i) => {
    if (typeof entry !== 'string') {
      out.report(`${key}[${i}]`, 'expected a string')
    } else if (opts.nonEmptyEntries && entry.length === 0) {
      out.report(`${key}[${i}]`, 'must not be an empty string')
    } else {
      result.push(entry)
    }
  })
  return result
}

function readOptionalString(obj: Doc, key: string, path: string, out: Violations): string | undefined {
  const raw = obj[key]
  if (raw === undefined) return undefined
  if (typeof raw !== 'string') {
    out.report(`${path}.${key}`, 'expected a string')
    return undefined
  }
  return raw
}

function readHeader(doc: Doc, out: Violations): { order: HeaderField[]; len: number[] } | undefined {
  const order: HeaderField[] = []
  const len: number[] = []
  let valid = true

  const rawOrder = doc.header_order
  if (!Array.isArray(rawOrder)) {
    if (rawOrder !== undefined) out.report('header_order', 'expected a list of "ID" / "DATA" entries')
    valid = false
  } else {
    rawOrder.forEach((entry: unknown, i) => {
      if (entry === 'ID' || entry === 'DATA') {
        order.push(entry)
      } else {
        out.report(`header_order[${i}]`, `unknown header ${JSON.stringify(entry)}; expected "ID" or "DATA"`)
        valid = false
      }
    })
    const ids = order.filter((h) => h === 'ID').length
    const data = order.filter((h) => h === 'DATA').length
    if (valid && (ids !== 1 || data !== 1)) {
      out.report('header_order', `must name exactly one "ID" and one "DATA" field (found ${ids} ID, ${data} DATA)`)
      valid = false
    }
  }

  const rawLen = doc.header_len
  if (!Array.isArray(rawLen)) {
    if (rawLen !== undefined) out.report('header_len', 'expected a list of positive integers')
    valid = false
  } else {
    rawLen.forEach((entry: unknown, i) => {
      if (typeof entry === 'number' && Number.isInteger(entry) && entry >= 1) {
        len.push(entry)
      } else {
        out.report(`header_len[${i}]`, 'expected a positive integer')
        valid = false
      }
    })
  }

  if (Array.isArray(rawOrder) && Array.isArray(rawLen) && rawOrder.length !== rawLen.length) {
    out.report('header_len', `has ${rawLen.length} entries but header_order has ${rawOrder.length}`)
    valid = false
  }

  return valid ? { order, len } : undefined
}

// Frame formats compare ids by their rendering; text formats compare verbatim.
type IdCanonicalizer = (raw: string, path: string, out: Violations) => string | undefined

const verbatimIds: IdCanonicalizer = (raw) => raw

function frameIds(idBits: number): IdCanonicalizer {
  return (raw, path, out) => {
    const value = parseIntegerId(raw)
    if (value === null) {
      out.report(path, `${JSON.stringify(raw)} is not an integer id (use 0x…, 0b…, 0o… or decimal)`)
      return undefined
    }
    if (!fitsInBits(value, idBits)) {
      out.report(path, `${raw} does not fit in the ${idBits}-bit ID field`)
      return undefined
    }
    return renderHexId(value, idBits)
  }
}

function readPacketIds(doc: Doc, canonical: IdCanonicalizer, out: Violations): Set<string> {
  const ids = new Set<string>()
  const raw = readStringList(doc, 'packet_ids', out, { nonEmptyList: true, nonEmptyEntries: true })
  raw?.forEach((id, i) => {
    const value = canonical(id, `packet_ids[${i}]`, out)
    if (value !== undefined) ids.add(value)
  })
  return ids
}

function readGraphDefinitions(
  doc: Doc,
  canonical: IdCanonicalizer,
  packetIds: Set<string> | null,
  out: Violations,
): Map<string, GraphDefinition> {
  const defs = new Map<string, GraphDefinition>()
  const raw = doc.graph_definitions
  if (raw === undefined) return defs
  if (!isRecord(raw)) {
    out.report('graph_definitions', 'expected an object keyed by series id')
    return defs
  }

  const readId = (obj: Doc, path: string): string | undefined => {
    const id = readOptionalString(obj, 'packet_id', path, out)
    if (id === undefined) return undefined
    const value = canonical(id, `${path}.packet_id`, out)
    if (value !== undefined && packetIds && !packetIds.has(value)) {
      out.report(`${path}.packet_id`, `${id} is not listed in packet_ids`)
      return undefined
    }
    return value
  }

  for (const [seriesId, def] of Object.entries(raw)) {
    const path = `graph_definitions.${seriesId}`
    if (!isRecord(def)) {
      out.report(path, 'expected an object')
      continue
    }
    const title = readOptionalString(def, 'title', path, out)

    let x: GraphDefinition['x'] = { mode: 'index' }
    if (def.x !== undefined) {
      if (!isRecord(def.x)) {
        out.report(`${path}.x`, 'expected an object')
      } else {
        const useTime = def.x.use_time
        if (useTime !== undefined && typeof useTime !== 'boolean') {
          out.report(`${path}.x.use_time`, 'expected a boolean')
        }
        const indexId = readId(def.x, `${path}.x`)
        const xAxis = readOptionalString(def.x, 'x_axis', `${path}.x`, out)
        const mode = indexId !== undefined ? 'inline' : useTime === true ? 'time' : 'index'
        x = { mode, packetId: indexId, xAxis }
      }
    }

    if (!isRecord(def.y)) {
      out.report(`${path}.y`, def.y === undefined ? 'missing mandatory field' : 'expected an object')
      continue
    }
    if (def.y.packet_id === undefined) {
      out.report(`${path}.y.packet_id`, 'missing mandatory field')
      continue
    }
    const yId = readId(def.y, `${path}.y`)
    const yAxis = readOptionalString(def.y, 'y_axis', `${path}.y`, out)
    if (yId === undefined) continue

    defs.set(seriesId, Object.freeze({
      title,
      x: Object.freeze(x),
      y: Object.freeze({ packetId: yId, yAxis }),
    }))
  }
  return defs
}

function readFilter(doc: Doc, out: Violations): Pick<FormatDescriptor, 'filter' | 'filterSource'> {
  const raw = doc.filter_function
  if (raw === undefined) return {}
  if (isPacketFilter(raw)) return { filter: raw }
  if (typeof raw !== 'string') {
    out.report('filter_function', 'expected a function body (string) or a function')
    return {}
  }
  try {
    return { filter: compileFilter(raw), filterSource: raw }
  } catch (err) {
    out.report('filter_function', `does not compile: ${err instanceof Error ? err.message : String(err)}`)
    return {}
  }
}

function checkFieldSet(doc: Doc, type: PacketType, out: Violations): void {
  const { mandatory, optional } = FIELDS_BY_TYPE[type]
  for (const field of mandatory) {
    if (doc[field] === undefined) out.report(field, 'missing mandatory field')
  }
  for (const field of FORMAT_FIELDS) {
    if (doc[field] !== undefined && !mandatory.includes(field) && !optional.includes(field)) {
      out.report(field, `not allowed for packet type ${type}`)
    }
  }
}

function idBitsOf(header: { order: HeaderField[]; len: number[] }, unitBits: number): number {
  return header.len[header.order.indexOf('ID')] * unitBits
}

/**
 * Validates a packet format document (the `packet_format` object of a packet
 * configuration) and builds the frozen descriptor the decoders run on.
 *
 * Every problem found is collected; when there is at least one, a single
 * {@link ConfigError} listing all of them is thrown.
 */
export function validateFormat(document: unknown): FormatDescriptor {
  if (!isRecord(document)) {
    throw new ConfigError([{ path: '$', message: 'expected an object' }])
  }
  const out = new Violations()
  const type = document.type

  if (!isPacketType(type)) {
    out.report('type', type === undefined
      ? 'missing mandatory field'
      : `unknown packet type ${JSON.stringify(type)}; expected 0, 1, 2 or 3`)
    // Still report what can be checked without knowing the type.
    readPacketIds(document, verbatimIds, out)
    readGraphDefinitions(document, verbatimIds, null, out)
    throw new ConfigError(out.list)
  }

  checkFieldSet(document, type, out)
  const descriptor = buildDescriptor(type, document, out)

  if (!out.empty) throw new ConfigError(out.list)
  return Object.freeze(descriptor)
}

function buildDescriptor(type: PacketType, doc: Doc, out: Violations): FormatDescriptor {
  switch (type) {
    case 0:
    case 1: {
      const packetDelimiters = Object.freeze(
        readStringList(doc, 'packet_delimiters', out, { nonEmptyList: true, nonEmptyEntries: true }) ?? [],
      )
      const packetIds = readPacketIds(doc, verbatimIds, out)
      const graphDefinitions = readGraphDefinitions(doc, verbatimIds, packetIds, out)
      const filter = readFilter(doc, out)
      const dataDelimiters = readStringList(doc, 'data_delimiters', out, { nonEmptyEntries: true })

      if (type === 0) {
        const ignore = readStringList(doc, 'ignore', out, { nonEmptyEntries: true })
        return {
          type,
          packetDelimiters,
          dataDelimiters: Object.freeze(dataDelimiters ?? []),
          ignore: Object.freeze(ignore ?? []),
          packetIds,
          graphDefinitions,
          ...filter,
        }
      }

      const specifiers = readStringList(doc, 'specifiers', out, { nonEmptyEntries: true })
      if (specifiers && specifiers.length !== 2) {
        out.report('specifiers', `expected exactly 2 entries (id, data), got ${specifiers.length}`)
      } else if (specifiers && specifiers[0] === specifiers[1]) {
        out.report('specifiers', 'id and data specifiers must differ')
      }
      return {
        type,
        packetDelimiters,
        dataDelimiters: Object.freeze(dataDelimiters ?? DEFAULT_PAIR_DATA_DELIMITERS),
        specifiers: Object.freeze([specifiers?.[0] ?? '', specifiers?.[1] ?? ''] as const),
        packetIds,
        graphDefinitions,
        ...filter,
      }
    }
    case 2:
    case 3: {
      const header = readHeader(doc, out)
      const canonical = header ? frameIds(idBitsOf(header, type === 2 ? 8 : 1)) : verbatimIds
      const packetIds = readPacketIds(doc, canonical, out)
      const graphDefinitions = readGraphDefinitions(doc, canonical, header ? packetIds : null, out)
      return {
        type,
        headerOrder: Object.freeze(header?.order ?? []),
        headerLen: Object.freeze(header?.len ?? []),
        packetIds,
        graphDefinitions,
        ...readFilter(doc, out),
      }
    }
  }
}

/**
 * Structural equality of two descriptors. Filters compiled from source compare
 * by their source text, filters given as functions by identity.
 */
export function sameFormat(a: FormatDescriptor, b: FormatDescriptor): boolean {
  const plain = (d: FormatDescriptor) => JSON.stringify({
    ...d,
    packetIds: [...d.packetIds].sort(),
    graphDefinitions: [...d.graphDefinitions.entries()],
    filter: undefined,
  })
  const sameFilter = a.filterSource !== undefined || b.filterSource !== undefined
    ? a.filterSource === b.filterSource
    : a.filter === b.filter
  return sameFilter && plain(a) === plain(b)
}
