import type { FormatDescriptor, PacketDecoder } from './types'
import { HumanReadableDecoder } from './builtins/humanReadableDecoder'
import { PairedTokenDecoder } from './builtins/pairedTokenDecoder'
import { BitFrameDecoder, ByteFrameDecoder } from './builtins/frameDecoder'

export interface DecoderOptions {
  /** Longest text fragment kept while waiting for a delimiter (types 0/1). */
  maxFragmentLength?: number
}

/** Builds a fresh decoder, with empty stream state, for a descriptor. */
export function createDecoder(descriptor: FormatDescriptor, options: DecoderOptions = {}): PacketDecoder {
  switch (descriptor.type) {
    case 0:
      return new HumanReadableDecoder(descriptor, options.maxFragmentLength)
    case 1:
      return new PairedTokenDecoder(descriptor, options.maxFragmentLength)
    case 2:
      return new ByteFrameDecoder(descriptor)
    case 3:
      return new BitFrameDecoder(descriptor)
  }
}
