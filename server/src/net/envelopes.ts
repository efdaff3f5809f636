import type { FeedEnvelope, Track, TrackJson } from '@/types/tais'

const encoder = new TextEncoder()

export const trackAgeSec = (track: Track, nowMs: number) =>
  Math.max(0, Math.floor((nowMs - track.lastSeenMs) / 1000))

export const toTrackJson = (track: Track, nowMs = Date.now()): TrackJson => ({
  facility: track.facility,
  trackNum: track.trackNum,
  callsign: track.callsign,
  acType: track.aircraftType,
  equip: track.equipmentSuffix,
  wake: track.wakeCategory,
  rules: track.flightRules,
  origin: track.origin,
  dest: track.destination,
  entryFix: track.entryFix,
  exitFix: track.exitFix,
  assignedSqk: track.assignedSquawk,
  reportedSqk: track.reportedSquawk,
  reqAlt: track.requestedAltitude,
  runway: track.runway,
  sp1: track.scratchpad1,
  sp2: track.scratchpad2,
  owner: track.owner,
  handoff: track.pendingHandoff,
  lat: track.lat,
  lon: track.lon,
  altFt: track.altitudeFt,
  gs: track.groundSpeedKts,
  trk: track.groundTrackDeg,
  vs: track.verticalRateFpm,
  modeS: track.modeSCode,
  frozen: track.frozen,
  pseudo: track.pseudo,
  ageSec: trackAgeSec(track, nowMs),
})

export const encodeEnvelope = (envelope: FeedEnvelope): Uint8Array =>
  encoder.encode(JSON.stringify(envelope))
