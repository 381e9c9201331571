import type { PacketValue } from '../types'

const MAX_EXACT_BITS = 53

export function hexDigitsForBits(bits: number): number {
  return Math.ceil(bits / 4)
}

export function renderHexId(value: bigint, bits: number): string {
  return `0x${value.toString(16).padStart(hexDigitsForBits(bits), '0')}`
}

/**
 * Parses a configured frame id written as `0x…`, `0b…`, `0o…` or decimal.
 * Returns null when the text is not an unsigned integer literal.
 */
export function parseIntegerId(text: string): bigint | null {
  const trimmed = text.trim().toLowerCase()
  if (!/^(0x[0-9a-f]+|0b[01]+|0o[0-7]+|[0-9]+)$/.test(trimmed)) return null
  return BigInt(trimmed)
}

export function fitsInBits(value: bigint, bits: number): boolean {
  return value >= 0n && value < (1n << BigInt(bits))
}

export function toFieldValue(value: bigint, bits: number): number | bigint {
  return bits <= MAX_EXACT_BITS ? Number(value) : value
}

export function formatPacketValue(value: PacketValue): string {
  if (value instanceof Uint8Array) {
    return Array.from(value, (b) => b.toString(16).padStart(2, '0')).join(' ')
  }
  return String(value)
}
