import type { FacilityId } from '@/types/tais'
import { appEnv } from '../config/serverEnv'
import { trackFeed, type TrackFeedService } from '../feed/trackFeedService'
import { QueuedClient, type FrameSink } from '../net/queuedClient'

type FeedSubscriptions = Pick<TrackFeedService, 'subscribe' | 'unsubscribe'>

/** Maps a room's session ids onto feed subscriptions for one facility. */
export class FacilitySessions {
  private subscriptions = new Map<string, string>()

  constructor(
    readonly facility: FacilityId,
    private feed: FeedSubscriptions = trackFeed,
    private queueMax = appEnv.clientQueueMax,
  ) {}

  join(sessionId: string, sink: FrameSink) {
    const transport = new QueuedClient(sink, { maxPending: this.queueMax, label: sessionId })
    const clientId = this.feed.subscribe(this.facility, transport)
    this.subscriptions.set(sessionId, clientId)
    return clientId
  }

  leave(sessionId: string) {
    const clientId = this.subscriptions.get(sessionId)
    if (!clientId) return false
    this.subscriptions.delete(sessionId)
    return this.feed.unsubscribe(this.facility, clientId)
  }

  leaveAll() {
    const sessions = Array.from(this.subscriptions.keys())
    sessions.forEach((sessionId) => this.leave(sessionId))
    return sessions.length
  }

  get size() {
    return this.subscriptions.size
  }
}
