import type { FeedEnvelopeType } from '@/types/tais'
import type { ClientTransport } from './clientTransport'

/** The underlying connection a QueuedClient drains into. */
export type FrameSink = {
  isOpen: () => boolean
  send: (frame: Uint8Array) => void
}

type QueuedClientOptions = {
  /** Frames held before superseded snapshot/batch frames are dropped. */
  maxPending?: number
  label?: string
  schedule?: (drain: () => void) => void
}

type PendingFrame = {
  frame: Uint8Array
  kind: FeedEnvelopeType
}

const DEFAULT_MAX_PENDING = 256

const carriesFullList = (entry: PendingFrame) => entry.kind !== 'remove'

/**
 * Per-client outbound queue. Producers enqueue and return immediately; frames
 * are written to the sink on a later turn of the event loop.
 *
 * Past `maxPending` the queue sheds snapshot and batch frames that a newer
 * full list already covers. Remove frames are never shed: nothing else tells
 * the client a track is gone, so they may hold the queue over its bound.
 */
export class QueuedClient implements ClientTransport {
  private pending: PendingFrame[] = []

  private drainScheduled = false

  private failed = false

  private dropped = 0

  private overBoundWarned = false

  private readonly maxPending: number

  private readonly schedule: (drain: () => void) => void

  constructor(
    private sink: FrameSink,
    private options: QueuedClientOptions = {},
  ) {
    this.maxPending = Math.max(1, options.maxPending ?? DEFAULT_MAX_PENDING)
    this.schedule = options.schedule ?? ((drain) => setImmediate(drain))
  }

  isOpen() {
    return !this.failed && this.sink.isOpen()
  }

  enqueue(frame: Uint8Array, kind: FeedEnvelopeType) {
    if (!this.isOpen()) return false
    this.pending.push({ frame, kind })
    this.shedSuperseded()
    if (!this.drainScheduled) {
      this.drainScheduled = true
      this.schedule(() => this.drain())
    }
    return true
  }

  get pendingCount() {
    return this.pending.length
  }

  get droppedCount() {
    return this.dropped
  }

  private shedSuperseded() {
    while (this.pending.length > this.maxPending) {
      const index = this.oldestSupersededIndex()
      if (index < 0) {
        if (!this.overBoundWarned) {
          this.overBoundWarned = true
          console.warn('[feed] client queue over bound with removals pending', {
            client: this.options.label,
            pending: this.pending.length,
            maxPending: this.maxPending,
          })
        }
        return
      }
      this.pending.splice(index, 1)
      this.dropped += 1
    }
  }

  /** Oldest snapshot/batch frame with a newer one behind it, or -1. */
  private oldestSupersededIndex() {
    let newest = -1
    for (let i = this.pending.length - 1; i >= 0; i -= 1) {
      if (carriesFullList(this.pending[i])) {
        newest = i
        break
      }
    }
    return this.pending.findIndex((entry, i) => i < newest && carriesFullList(entry))
  }

  private drain() {
    this.drainScheduled = false
    this.overBoundWarned = false
    const frames = this.pending
    this.pending = []
    for (const { frame } of frames) {
      if (!this.isOpen()) return
      try {
        this.sink.send(frame)
      } catch (error) {
        this.failed = true
        console.warn('[feed] client send failed', {
          client: this.options.label,
          message: error instanceof Error ? error.message : String(error),
        })
        return
      }
    }
  }
}
