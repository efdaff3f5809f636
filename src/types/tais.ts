export type FacilityId = string

export type TrackNum = string

/** Live state for one facility-scoped radar track. */
export type Track = {
  facility: FacilityId
  trackNum: TrackNum
  lat: number
  lon: number
  altitudeFt: number | null
  /** Derived from vx/vy. */
  groundSpeedKts: number | null
  /** Derived from vx/vy, degrees true in [0, 360). */
  groundTrackDeg: number | null
  verticalRateFpm: number | null
  callsign: string | null
  aircraftType: string | null
  equipmentSuffix: string | null
  wakeCategory: string | null
  flightRules: string | null
  origin: string | null
  destination: string | null
  entryFix: string | null
  exitFix: string | null
  assignedSquawk: string | null
  reportedSquawk: string | null
  requestedAltitude: number | null
  runway: string | null
  scratchpad1: string | null
  scratchpad2: string | null
  /** Owning controller position (CPS). */
  owner: string | null
  pendingHandoff: string | null
  /** Mode S transponder address, hex. */
  modeSCode: string | null
  frozen: boolean
  pseudo: boolean
  lastSeenMs: number
}

export type TrackPosition = Pick<Track, 'lat' | 'lon'>

/**
 * Sparse field update for one track. `undefined` means "leave the stored value
 * alone"; position is always present because records without it are dropped.
 */
export type TrackUpdate = {
  trackNum: TrackNum
  position: TrackPosition
  fields: Partial<Omit<Track, 'facility' | 'trackNum' | 'lat' | 'lon' | 'lastSeenMs'>>
}

/** Wire shape for a track. Key names are part of the client contract. */
export type TrackJson = {
  facility: FacilityId
  trackNum: TrackNum
  callsign: string | null
  acType: string | null
  equip: string | null
  wake: string | null
  rules: string | null
  origin: string | null
  dest: string | null
  entryFix: string | null
  exitFix: string | null
  assignedSqk: string | null
  reportedSqk: string | null
  reqAlt: number | null
  runway: string | null
  sp1: string | null
  sp2: string | null
  owner: string | null
  handoff: string | null
  lat: number
  lon: number
  altFt: number | null
  gs: number | null
  trk: number | null
  vs: number | null
  modeS: string | null
  frozen: boolean
  pseudo: boolean
  ageSec: number
}

export type TrackRemoval = {
  facility: FacilityId
  trackNum: TrackNum
}

export type FeedEnvelope =
  | { type: 'snapshot'; payload: TrackJson[] }
  | { type: 'batch'; payload: TrackJson[] }
  | { type: 'remove'; payload: TrackRemoval }

export type FeedEnvelopeType = FeedEnvelope['type']

export type FacilitySnapshot = {
  facility: FacilityId
  tracks: TrackJson[]
}

export type DirectoryEntry = {
  facility: FacilityId
  trackCount: number
}
