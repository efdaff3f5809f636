import type { Client } from 'colyseus'
import { ClientState, Room } from 'colyseus'
import type { FrameSink } from '../net/queuedClient'
import { FacilitySessions } from './facilitySessions'

/** Message type carrying every feed envelope; the envelope's own `type` tells them apart. */
export const FEED_MESSAGE = 'feed'

const FACILITY_PATTERN = /^[A-Za-z0-9]{2,8}$/

export const resolveFacility = (options: unknown): string | null => {
  if (!options || typeof options !== 'object' || !('facility' in options)) return null
  const { facility } = options
  if (typeof facility !== 'string') return null
  const trimmed = facility.trim()
  return FACILITY_PATTERN.test(trimmed) ? trimmed : null
}

export const createClientSink = (client: Pick<Client, 'state' | 'sendBytes'>): FrameSink => ({
  isOpen: () => client.state !== ClientState.LEAVING,
  send: (frame) => client.sendBytes(FEED_MESSAGE, frame),
})

/**
 * One room per facility (registered with filterBy(['facility'])). Joining
 * subscribes the session to the facility feed; leaving unsubscribes it.
 */
export class FacilityRoom extends Room {
  maxClients = 500

  private sessions?: FacilitySessions

  onCreate(options: Record<string, unknown>) {
    const facility = resolveFacility(options)
    if (!facility) {
      throw new Error('facility option must be 2-8 letters or digits')
    }
    this.sessions = new FacilitySessions(facility)
    void this.setMetadata({ facility })
    console.info('[FacilityRoom] created', { roomId: this.roomId, facility })
  }

  onJoin(client: Client) {
    if (!this.sessions) return
    const clientId = this.sessions.join(client.sessionId, createClientSink(client))
    console.info('[FacilityRoom] client joined', {
      sessionId: client.sessionId,
      facility: this.sessions.facility,
      clientId,
    })
  }

  onLeave(client: Client, consented: boolean) {
    if (!this.sessions) return
    this.sessions.leave(client.sessionId)
    console.info('[FacilityRoom] client left', {
      sessionId: client.sessionId,
      facility: this.sessions.facility,
      consented,
    })
  }

  onDispose() {
    const released = this.sessions?.leaveAll() ?? 0
    console.info('[FacilityRoom] disposed', {
      roomId: this.roomId,
      facility: this.sessions?.facility,
      released,
    })
  }
}
