import type { FacilityId } from '@/types/tais'
import { createId } from '@/utils/ids'
import type { ClientTransport } from '../net/clientTransport'

export type RegisteredClient = {
  id: string
  facility: FacilityId
  transport: ClientTransport
}

/** Facility-scoped subscriber sets. Independent of whether the facility has tracks. */
export class ClientRegistry {
  private facilityClients = new Map<FacilityId, Map<string, RegisteredClient>>()

  add = (facility: FacilityId, transport: ClientTransport): RegisteredClient => {
    let clients = this.facilityClients.get(facility)
    if (!clients) {
      clients = new Map()
      this.facilityClients.set(facility, clients)
    }
    const client: RegisteredClient = { id: createId('client'), facility, transport }
    clients.set(client.id, client)
    return client
  }

  remove = (facility: FacilityId, clientId: string) => {
    const clients = this.facilityClients.get(facility)
    if (!clients) return false
    const removed = clients.delete(clientId)
    if (clients.size === 0) {
      this.facilityClients.delete(facility)
    }
    return removed
  }

  clientsOf = (facility: FacilityId): RegisteredClient[] =>
    Array.from(this.facilityClients.get(facility)?.values() ?? [])

  clientCount = (facility: FacilityId) => this.facilityClients.get(facility)?.size ?? 0

  totalClients = () => {
    let total = 0
    this.facilityClients.forEach((clients) => {
      total += clients.size
    })
    return total
  }

  facilities = (): FacilityId[] => Array.from(this.facilityClients.keys())

  /** Drops every client whose transport reports closed. Returns how many went. */
  pruneClosed = () => {
    let pruned = 0
    for (const client of this.facilities().flatMap((facility) => this.clientsOf(facility))) {
      if (!client.transport.isOpen() && this.remove(client.facility, client.id)) {
        pruned += 1
      }
    }
    return pruned
  }
}
