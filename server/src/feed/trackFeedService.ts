import type {
  DirectoryEntry,
  FacilityId,
  FacilitySnapshot,
  FeedEnvelopeType,
  Track,
  TrackJson,
  TrackRemoval,
} from '@/types/tais'
import { parseTaisMessage, TAIS_TOPIC_PREFIX } from '@/logic/taisMessage'
import { appEnv } from '../config/serverEnv'
import type { ClientTransport } from '../net/clientTransport'
import { encodeEnvelope, toTrackJson } from '../net/envelopes'
import { ClientRegistry, type RegisteredClient } from '../state/clientRegistry'
import { DirtyTracker } from '../state/dirtyTracker'
import { TrackStore } from '../state/trackStore'

const feedDebug = (...args: unknown[]) => {
  if (!appEnv.debugFeedLogs) return
  console.info('[feed:debug]', ...args)
}

export type TrackFeedOptions = {
  topicPrefix?: string
  flushIntervalMs?: number
  purgeIntervalMs?: number
  staleAfterMs?: number
  /** Sweep clients whose transport closed outside a broadcast on every purge. */
  pruneClosedClients?: boolean
  now?: () => number
}

export type TrackFeedStats = {
  facilities: number
  tracks: number
  clients: number
  dirty: number
}

const snapshotKey = (track: Track) => track.callsign ?? track.trackNum

const compareForSnapshot = (a: Track, b: Track) => {
  const keyA = snapshotKey(a)
  const keyB = snapshotKey(b)
  if (keyA !== keyB) return keyA < keyB ? -1 : 1
  if (a.trackNum === b.trackNum) return 0
  return a.trackNum < b.trackNum ? -1 : 1
}

/**
 * Live per-facility track state fed by TAIS messages and fanned out to
 * facility subscribers as snapshot, batch and remove envelopes.
 */
export class TrackFeedService {
  private flushTimer?: ReturnType<typeof setInterval>

  private purgeTimer?: ReturnType<typeof setInterval>

  private readonly now: () => number

  constructor(
    private store = new TrackStore(),
    private registry = new ClientRegistry(),
    private dirty = new DirtyTracker(),
    private options: TrackFeedOptions = {},
  ) {
    this.now = options.now ?? Date.now
  }

  private get staleAfterMs() {
    return this.options.staleAfterMs ?? appEnv.staleAfterMs
  }

  /**
   * Applies one upstream message. Unrecognized topics, foreign documents and
   * malformed bodies are dropped; this never throws. Returns the number of
   * track records applied.
   */
  processMessage(topic: string, body: string | Uint8Array): number {
    const result = parseTaisMessage(topic, body, this.options.topicPrefix ?? TAIS_TOPIC_PREFIX)
    if (!result.ok) {
      if (result.error.kind === 'parse') {
        console.warn('[tais] dropped malformed message', {
          topic,
          kind: result.error.kind,
          message: result.error.message,
        })
      } else {
        feedDebug('ignored message', { topic, ...result.error })
      }
      return 0
    }

    const nowMs = this.now()
    result.updates.forEach((update) => this.store.upsert(result.facility, update, nowMs))
    if (result.updates.length > 0) {
      this.dirty.markDirty(result.facility)
    }
    if (result.skipped > 0) {
      feedDebug('skipped records without id or position', {
        facility: result.facility,
        skipped: result.skipped,
      })
    }
    return result.updates.length
  }

  subscribe(facility: FacilityId, transport: ClientTransport): string {
    const client = this.registry.add(facility, transport)
    this.sendFrame(
      client,
      encodeEnvelope({ type: 'snapshot', payload: this.snapshot(facility).tracks }),
      'snapshot',
    )
    console.info('[feed] client subscribed', {
      facility,
      clientId: client.id,
      clients: this.registry.clientCount(facility),
    })
    return client.id
  }

  unsubscribe(facility: FacilityId, clientId: string): boolean {
    const removed = this.registry.remove(facility, clientId)
    if (removed) {
      console.info('[feed] client unsubscribed', {
        facility,
        clientId,
        clients: this.registry.clientCount(facility),
      })
    }
    return removed
  }

  snapshot(facility: FacilityId): FacilitySnapshot {
    const nowMs = this.now()
    const tracks: TrackJson[] = this.store
      .listTracks(facility)
      .sort(compareForSnapshot)
      .map((track) => toTrackJson(track, nowMs))
    return { facility, tracks }
  }

  directory(): DirectoryEntry[] {
    return this.store
      .facilities()
      .map((facility) => ({ facility, trackCount: this.store.trackCount(facility) }))
      .filter((entry) => entry.trackCount > 0)
      .sort((a, b) => b.trackCount - a.trackCount || (a.facility < b.facility ? -1 : 1))
  }

  /**
   * Sends the full track list of every facility updated since the last call to
   * its open subscribers. Returns the number of frames enqueued.
   */
  flushDirty(nowMs = this.now()): number {
    let sent = 0
    for (const facility of this.dirty.drainDirty()) {
      const clients = this.registry.clientsOf(facility)
      if (clients.length === 0) continue
      const tracks = this.store.listTracks(facility)
      if (tracks.length === 0) continue

      const frame = encodeEnvelope({
        type: 'batch',
        payload: tracks.map((track) => toTrackJson(track, nowMs)),
      })
      for (const client of clients) {
        if (!client.transport.isOpen()) continue
        if (this.sendFrame(client, frame, 'batch')) sent += 1
      }
    }
    return sent
  }

  /** Evicts tracks not updated within the staleness window and announces each removal. */
  purgeStale(nowMs = this.now()): TrackRemoval[] {
    const cutoff = nowMs - this.staleAfterMs
    const removed: TrackRemoval[] = []

    for (const facility of this.store.facilities()) {
      const stale = this.store.listTracks(facility).filter((track) => track.lastSeenMs < cutoff)
      for (const track of stale) {
        if (!this.store.remove(facility, track.trackNum)) continue
        const removal: TrackRemoval = { facility, trackNum: track.trackNum }
        removed.push(removal)
        const frame = encodeEnvelope({ type: 'remove', payload: removal })
        this.registry
          .clientsOf(facility)
          .forEach((client) => this.sendFrame(client, frame, 'remove'))
      }
    }

    if (removed.length > 0) {
      console.info('[feed] purged stale tracks', { count: removed.length })
    }

    if (this.options.pruneClosedClients ?? appEnv.pruneClosedClients) {
      const pruned = this.registry.pruneClosed()
      if (pruned > 0) {
        console.info('[feed] pruned closed clients', { count: pruned })
      }
    }
    return removed
  }

  stats(): TrackFeedStats {
    const facilities = this.store.facilities()
    return {
      facilities: facilities.length,
      tracks: facilities.reduce((sum, facility) => sum + this.store.trackCount(facility), 0),
      clients: this.registry.totalClients(),
      dirty: this.dirty.size,
    }
  }

  start() {
    if (this.flushTimer || this.purgeTimer) return
    const flushIntervalMs = this.options.flushIntervalMs ?? appEnv.flushIntervalMs
    const purgeIntervalMs = this.options.purgeIntervalMs ?? appEnv.purgeIntervalMs
    this.flushTimer = setInterval(() => {
      try {
        this.flushDirty()
      } catch (error) {
        console.error('[feed] broadcast cycle failed', error)
      }
    }, flushIntervalMs)
    this.purgeTimer = setInterval(() => {
      try {
        this.purgeStale()
      } catch (error) {
        console.error('[feed] stale purge failed', error)
      }
    }, purgeIntervalMs)
    console.info('[feed] timers started', {
      flushIntervalMs,
      purgeIntervalMs,
      staleAfterMs: this.staleAfterMs,
    })
  }

  stop() {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = undefined
    }
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer)
      this.purgeTimer = undefined
    }
  }

  isRunning = () => Boolean(this.flushTimer && this.purgeTimer)

  private sendFrame(client: RegisteredClient, frame: Uint8Array, kind: FeedEnvelopeType) {
    try {
      return client.transport.enqueue(frame, kind)
    } catch (error) {
      console.warn('[feed] enqueue failed', {
        facility: client.facility,
        clientId: client.id,
        message: error instanceof Error ? error.message : String(error),
      })
      return false
    }
  }
}

export const trackFeed = new TrackFeedService(
  new TrackStore(),
  new ClientRegistry(),
  new DirtyTracker(),
  {
    topicPrefix: appEnv.topicPrefix,
    flushIntervalMs: appEnv.flushIntervalMs,
    purgeIntervalMs: appEnv.purgeIntervalMs,
    staleAfterMs: appEnv.staleAfterMs,
    pruneClosedClients: appEnv.pruneClosedClients,
  },
)
