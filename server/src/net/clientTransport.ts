import type { FeedEnvelopeType } from '@/types/tais'

/**
 * What the feed needs from a subscriber's connection. Implementations must
 * not block: `enqueue` hands the frame off and reports whether it was taken.
 * `kind` is the envelope type the frame encodes.
 */
export interface ClientTransport {
  isOpen(): boolean
  enqueue(frame: Uint8Array, kind: FeedEnvelopeType): boolean
}
