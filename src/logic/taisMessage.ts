import { DOMParser } from '@xmldom/xmldom'
import type { FacilityId, TrackUpdate } from '@/types/tais'
import { groundVectorFromVelocity } from '@/utils/geometry'

export const TAIS_TOPIC_PREFIX = 'TAIS/'
export const TAIS_ROOT_ELEMENT = 'TATrackAndFlightPlan'

export type TaisParseErrorKind = 'topic' | 'parse' | 'schema'

export type TaisParseError = {
  kind: TaisParseErrorKind
  message: string
}

export type TaisParseResult =
  | {
      ok: true
      facility: FacilityId
      updates: TrackUpdate[]
      /** Records dropped for lacking a track number or position. */
      skipped: number
    }
  | { ok: false; error: TaisParseError }

type TrackFields = TrackUpdate['fields']

const ELEMENT_NODE = 1

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const INT_PATTERN = /^[+-]?\d+$/
const INT32_MAX = 2 ** 31 - 1
const INT32_MIN = -(2 ** 31)

const decoder = new TextDecoder('utf-8')

export const isTaisTopic = (topic: string, prefix = TAIS_TOPIC_PREFIX) =>
  topic.toUpperCase().startsWith(prefix.toUpperCase())

const isElement = (node: Node | null): node is Element =>
  node !== null && node.nodeType === ELEMENT_NODE

const childElements = (parent: Element, name: string): Element[] => {
  const out: Element[] = []
  const nodes = parent.childNodes
  for (let i = 0; i < nodes.length; i += 1) {
    const node = nodes.item(i)
    if (isElement(node) && node.localName === name) {
      out.push(node)
    }
  }
  return out
}

const firstChild = (parent: Element, name: string): Element | undefined =>
  childElements(parent, name)[0]

/** Trimmed text of a child element; blank and missing both read as undefined. */
const readText = (parent: Element, name: string): string | undefined => {
  const value = firstChild(parent, name)?.textContent?.trim()
  return value ? value : undefined
}

const readFloat = (parent: Element, name: string): number | undefined => {
  const raw = readText(parent, name)
  if (!raw || !FLOAT_PATTERN.test(raw)) return undefined
  const parsed = Number(raw)
  return Number.isFinite(parsed) ? parsed : undefined
}

const readInt = (parent: Element, name: string): number | undefined => {
  const raw = readText(parent, name)
  if (!raw || !INT_PATTERN.test(raw)) return undefined
  const parsed = Number(raw)
  return parsed >= INT32_MIN && parsed <= INT32_MAX ? parsed : undefined
}

/** Present flag elements are true only for a literal "1"; missing ones stay undefined. */
const readFlag = (parent: Element, name: string): boolean | undefined => {
  const element = firstChild(parent, name)
  if (!element) return undefined
  return element.textContent?.trim() === '1'
}

const withoutSentinel = (value: string | undefined, sentinel: string) =>
  value !== undefined && value.toLowerCase() === sentinel ? undefined : value

const withoutZeroAddress = (value: string | undefined) =>
  value !== undefined && /^0+$/.test(value) ? undefined : value

const readTrackFields = (trackEl: Element): TrackFields => {
  const fields: TrackFields = {
    reportedSquawk: readText(trackEl, 'reportedBeaconCode'),
    altitudeFt: readInt(trackEl, 'reportedAltitude'),
    verticalRateFpm: readInt(trackEl, 'vVert'),
    frozen: readFlag(trackEl, 'frozen'),
    pseudo: readFlag(trackEl, 'pseudo'),
    modeSCode: withoutZeroAddress(readText(trackEl, 'acAddress')),
  }

  const vx = readInt(trackEl, 'vx')
  const vy = readInt(trackEl, 'vy')
  if (vx !== undefined && vy !== undefined) {
    const vector = groundVectorFromVelocity(vx, vy)
    fields.groundSpeedKts = vector.speedKts
    fields.groundTrackDeg = vector.trackDeg ?? undefined
  }
  return fields
}

const readFlightPlanFields = (planEl: Element): TrackFields => ({
  callsign: readText(planEl, 'acid'),
  aircraftType: readText(planEl, 'acType'),
  flightRules: readText(planEl, 'flightRules'),
  entryFix: readText(planEl, 'entryFix'),
  exitFix: readText(planEl, 'exitFix'),
  assignedSquawk: readText(planEl, 'assignedBeaconCode'),
  requestedAltitude: readInt(planEl, 'requestedAltitude'),
  runway: readText(planEl, 'runway'),
  scratchpad1: readText(planEl, 'scratchPad1'),
  scratchpad2: readText(planEl, 'scratchPad2'),
  owner: withoutSentinel(readText(planEl, 'cps'), 'unassigned'),
  wakeCategory: withoutSentinel(readText(planEl, 'category'), 'unavailable'),
  equipmentSuffix: withoutSentinel(readText(planEl, 'eqptSuffix'), 'unavailable'),
  pendingHandoff: readText(planEl, 'pendingHandoff'),
})

const readEnhancedFields = (enhancedEl: Element): TrackFields => ({
  origin: readText(enhancedEl, 'departureAirport'),
  destination: readText(enhancedEl, 'destinationAirport'),
})

export const parseTaisRecord = (record: Element): TrackUpdate | null => {
  const trackEl = firstChild(record, 'track')
  if (!trackEl) return null

  const trackNum = readText(trackEl, 'trackNum')
  if (!trackNum) return null

  const lat = readFloat(trackEl, 'lat')
  const lon = readFloat(trackEl, 'lon')
  if (lat === undefined || lon === undefined) return null

  const planEl = firstChild(record, 'flightPlan')
  const enhancedEl = firstChild(record, 'enhancedData')
  const fields: TrackFields = {
    ...readTrackFields(trackEl),
    ...(planEl ? readFlightPlanFields(planEl) : {}),
    ...(enhancedEl ? readEnhancedFields(enhancedEl) : {}),
  }

  return { trackNum, position: { lat, lon }, fields }
}

const parseDocument = (xml: string): Document => {
  const fail = (message: unknown) => {
    throw new Error(String(message))
  }
  return new DOMParser({
    errorHandler: { warning: () => undefined, error: fail, fatalError: fail },
  }).parseFromString(xml, 'text/xml')
}

const describeError = (error: unknown) =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error)

/**
 * Normalizes one TATrackAndFlightPlan message into sparse per-track updates.
 * Never throws; malformed input comes back as an error result.
 */
export const parseTaisMessage = (
  topic: string,
  body: string | Uint8Array,
  topicPrefix = TAIS_TOPIC_PREFIX,
): TaisParseResult => {
  if (!isTaisTopic(topic, topicPrefix)) {
    return { ok: false, error: { kind: 'topic', message: `unrecognized topic ${topic}` } }
  }

  let root: Element | null
  try {
    const xml = typeof body === 'string' ? body : decoder.decode(body)
    root = parseDocument(xml).documentElement
  } catch (error) {
    return { ok: false, error: { kind: 'parse', message: describeError(error) } }
  }

  if (!root || root.localName !== TAIS_ROOT_ELEMENT) {
    return {
      ok: false,
      error: { kind: 'schema', message: `unexpected root ${root?.localName ?? '(none)'}` },
    }
  }

  const facility = readText(root, 'src')
  if (!facility) {
    return { ok: false, error: { kind: 'schema', message: 'missing src facility' } }
  }

  const updates: TrackUpdate[] = []
  let skipped = 0
  for (const record of childElements(root, 'record')) {
    const update = parseTaisRecord(record)
    if (update) {
      updates.push(update)
    } else {
      skipped += 1
    }
  }

  return { ok: true, facility, updates, skipped }
}
