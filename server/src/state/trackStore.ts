import type { FacilityId, Track, TrackNum, TrackUpdate } from '@/types/tais'

export const createTrack = (facility: FacilityId, trackNum: TrackNum, nowMs = Date.now()): Track => ({
  facility,
  trackNum,
  lat: 0,
  lon: 0,
  altitudeFt: null,
  groundSpeedKts: null,
  groundTrackDeg: null,
  verticalRateFpm: null,
  callsign: null,
  aircraftType: null,
  equipmentSuffix: null,
  wakeCategory: null,
  flightRules: null,
  origin: null,
  destination: null,
  entryFix: null,
  exitFix: null,
  assignedSquawk: null,
  reportedSquawk: null,
  requestedAltitude: null,
  runway: null,
  scratchpad1: null,
  scratchpad2: null,
  owner: null,
  pendingHandoff: null,
  modeSCode: null,
  frozen: false,
  pseudo: false,
  lastSeenMs: nowMs,
})

/**
 * Applies a sparse update in place. Position and lastSeen always move;
 * every other field only changes when the update carries a value for it.
 */
export const applyTrackUpdate = (target: Track, update: TrackUpdate, nowMs: number) => {
  const { fields } = update
  target.lat = update.position.lat
  target.lon = update.position.lon
  target.lastSeenMs = nowMs

  target.reportedSquawk = fields.reportedSquawk ?? target.reportedSquawk
  target.altitudeFt = fields.altitudeFt ?? target.altitudeFt
  target.verticalRateFpm = fields.verticalRateFpm ?? target.verticalRateFpm
  target.groundSpeedKts = fields.groundSpeedKts ?? target.groundSpeedKts
  target.groundTrackDeg = fields.groundTrackDeg ?? target.groundTrackDeg
  target.modeSCode = fields.modeSCode ?? target.modeSCode
  target.frozen = fields.frozen ?? target.frozen
  target.pseudo = fields.pseudo ?? target.pseudo

  target.callsign = fields.callsign ?? target.callsign
  target.aircraftType = fields.aircraftType ?? target.aircraftType
  target.flightRules = fields.flightRules ?? target.flightRules
  target.entryFix = fields.entryFix ?? target.entryFix
  target.exitFix = fields.exitFix ?? target.exitFix
  target.assignedSquawk = fields.assignedSquawk ?? target.assignedSquawk
  target.requestedAltitude = fields.requestedAltitude ?? target.requestedAltitude
  target.runway = fields.runway ?? target.runway
  target.scratchpad1 = fields.scratchpad1 ?? target.scratchpad1
  target.scratchpad2 = fields.scratchpad2 ?? target.scratchpad2
  target.owner = fields.owner ?? target.owner
  target.wakeCategory = fields.wakeCategory ?? target.wakeCategory
  target.equipmentSuffix = fields.equipmentSuffix ?? target.equipmentSuffix
  target.pendingHandoff = fields.pendingHandoff ?? target.pendingHandoff

  target.origin = fields.origin ?? target.origin
  target.destination = fields.destination ?? target.destination
}

export class TrackStore {
  private facilityTracks = new Map<FacilityId, Map<TrackNum, Track>>()

  getOrCreate = (facility: FacilityId, trackNum: TrackNum, nowMs = Date.now()) => {
    let tracks = this.facilityTracks.get(facility)
    if (!tracks) {
      tracks = new Map()
      this.facilityTracks.set(facility, tracks)
    }
    let track = tracks.get(trackNum)
    if (!track) {
      track = createTrack(facility, trackNum, nowMs)
      tracks.set(trackNum, track)
    }
    return track
  }

  update = (track: Track, update: TrackUpdate, nowMs = Date.now()) => {
    applyTrackUpdate(track, update, nowMs)
  }

  /** Creates the track if needed and applies the update. */
  upsert = (facility: FacilityId, update: TrackUpdate, nowMs = Date.now()) => {
    const track = this.getOrCreate(facility, update.trackNum, nowMs)
    this.update(track, update, nowMs)
    return track
  }

  listTracks = (facility: FacilityId): Track[] =>
    Array.from(this.facilityTracks.get(facility)?.values() ?? [])

  remove = (facility: FacilityId, trackNum: TrackNum) => {
    const tracks = this.facilityTracks.get(facility)
    if (!tracks) return false
    const removed = tracks.delete(trackNum)
    if (tracks.size === 0) {
      this.facilityTracks.delete(facility)
    }
    return removed
  }

  facilities = (): FacilityId[] => Array.from(this.facilityTracks.keys())

  trackCount = (facility: FacilityId) => this.facilityTracks.get(facility)?.size ?? 0
}
