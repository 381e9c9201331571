import type {
  DropRecord,
  FilterVerdict,
  FormatDescriptor,
  PacketCandidate,
  PacketFilter,
  PacketValue,
} from './types'

export type FilterOutcome =
  | { accepted: true; value: PacketValue }
  | { accepted: false; drop: DropRecord }

export interface FilterStage {
  apply(candidate: PacketCandidate): FilterOutcome
}

function isPacketValue(value: unknown): value is PacketValue {
  return typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'bigint'
    || value instanceof Uint8Array
}

function normalizeVerdict(result: unknown): FilterVerdict | null {
  if (typeof result === 'boolean') return { accept: result }
  if (typeof result !== 'object' || result === null) return null
  if (!('accept' in result) || typeof result.accept !== 'boolean') return null
  if (!('value' in result) || result.value === undefined) return { accept: result.accept }
  return isPacketValue(result.value) ? { accept: result.accept, value: result.value } : null
}

/**
 * Compiles a filter written as a JavaScript function body. The body sees
 * `id` and `value` and returns a boolean or `{ accept, value }`.
 * Throws a SyntaxError when the body does not compile.
 */
export function compileFilter(source: string): PacketFilter {
  return new Function('id', 'value', source) as (id: string, value: PacketValue) => unknown
}

export function createFilterStage(descriptor: FormatDescriptor): FilterStage {
  const { packetIds, filter } = descriptor

  return {
    apply({ id, value }) {
      if (!packetIds.has(id)) {
        return { accepted: false, drop: { kind: 'filter', reason: 'not-listed', id, detail: `id ${id} is not listed` } }
      }
      if (!filter) return { accepted: true, value }

      let verdict: FilterVerdict | null
      try {
        verdict = normalizeVerdict(filter(id, value))
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err)
        return { accepted: false, drop: { kind: 'filter', reason: 'error', id, detail } }
      }
      if (!verdict) {
        return { accepted: false, drop: { kind: 'filter', reason: 'error', id, detail: 'filter returned an unsupported result' } }
      }
      if (!verdict.accept) {
        return { accepted: false, drop: { kind: 'filter', reason: 'rejected', id, detail: 'rejected by filter' } }
      }
      return { accepted: true, value: verdict.value ?? value }
    },
  }
}
