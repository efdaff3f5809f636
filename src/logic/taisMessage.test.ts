import { describe, it, expect } from 'vitest'
import { positionOnly, taisMessage } from '@/test/taisXml'
import { isTaisTopic, parseTaisMessage } from './taisMessage'

const TOPIC = 'TAIS/A80/TATrackAndFlightPlan'

const parseOk = (body: string) => {
  const result = parseTaisMessage(TOPIC, body)
  if (!result.ok) throw new Error(`expected ok, got ${result.error.kind}`)
  return result
}

describe('isTaisTopic', () => {
  it('matches the prefix case-insensitively', () => {
    expect(isTaisTopic('TAIS/A80')).toBe(true)
    expect(isTaisTopic('tais/a80')).toBe(true)
  })

  it('rejects other topics', () => {
    expect(isTaisTopic('SMES/KATL')).toBe(false)
    expect(isTaisTopic('XTAIS/A80')).toBe(false)
  })
})

describe('parseTaisMessage', () => {
  it('ignores unrecognized topics without parsing the body', () => {
    const result = parseTaisMessage('SMES/KATL', 'not xml at all')
    expect(result).toEqual({
      ok: false,
      error: { kind: 'topic', message: 'unrecognized topic SMES/KATL' },
    })
  })

  it('reports malformed bodies as errors instead of throwing', () => {
    expect(parseTaisMessage(TOPIC, '').ok).toBe(false)
    expect(parseTaisMessage(TOPIC, '<TATrackAndFlightPlan><src>A80</wrong></TATrackAndFlightPlan>').ok).toBe(false)
  })

  it('rejects documents with a different root element', () => {
    const result = parseTaisMessage(TOPIC, '<AsdexMsg><src>KATL</src></AsdexMsg>')
    expect(result).toEqual({
      ok: false,
      error: { kind: 'schema', message: 'unexpected root AsdexMsg' },
    })
  })

  it('rejects documents without a facility', () => {
    const result = parseTaisMessage(TOPIC, '<TATrackAndFlightPlan><record/></TATrackAndFlightPlan>')
    expect(result).toEqual({ ok: false, error: { kind: 'schema', message: 'missing src facility' } })
  })

  it('reads the facility from a namespaced root', () => {
    const result = parseOk(taisMessage('A80', [positionOnly(1201)]))
    expect(result.facility).toBe('A80')
    expect(result.updates).toHaveLength(1)
    expect(result.updates[0].trackNum).toBe('1201')
    expect(result.updates[0].position).toEqual({ lat: 33.6367, lon: -84.4281 })
  })

  it('accepts a byte body', () => {
    const body = new TextEncoder().encode(taisMessage('N90', [positionOnly(7)]))
    const result = parseTaisMessage('TAIS/N90', body)
    expect(result.ok && result.facility).toBe('N90')
  })

  it('skips records missing a track number or a numeric position', () => {
    const result = parseOk(
      taisMessage('A80', [
        { track: { lat: 33.1, lon: -84.1 } },
        { track: { trackNum: 10, lat: 'north', lon: -84.1 } },
        { track: { trackNum: 11, lat: 33.1 } },
        { flightPlan: { acid: 'DAL123' } },
        positionOnly(12),
      ]),
    )
    expect(result.updates.map((update) => update.trackNum)).toEqual(['12'])
    expect(result.skipped).toBe(4)
  })

  it('maps track, flight plan and enhanced fields', () => {
    const result = parseOk(
      taisMessage('A80', [
        {
          track: {
            trackNum: 1201,
            lat: 33.5,
            lon: -84.2,
            reportedBeaconCode: '4521',
            reportedAltitude: 11000,
            vVert: -1500,
            frozen: 1,
            pseudo: 0,
            acAddress: 'A1B2C3',
            vx: 0,
            vy: 250,
          },
          flightPlan: {
            acid: 'DAL123',
            acType: 'B739',
            flightRules: 'IFR',
            entryFix: 'HONIE',
            exitFix: 'ATL',
            assignedBeaconCode: '4521',
            requestedAltitude: 110,
            runway: '26R',
            scratchPad1: 'H26',
            scratchPad2: 'ILS',
            cps: '2P',
            category: 'H',
            eqptSuffix: 'L',
            pendingHandoff: '3T',
          },
          enhancedData: { departureAirport: 'KMCO', destinationAirport: 'KATL' },
        },
      ]),
    )
    expect(result.updates[0].fields).toEqual({
      reportedSquawk: '4521',
      altitudeFt: 11000,
      verticalRateFpm: -1500,
      frozen: true,
      pseudo: false,
      modeSCode: 'A1B2C3',
      groundSpeedKts: 250,
      groundTrackDeg: 0,
      callsign: 'DAL123',
      aircraftType: 'B739',
      flightRules: 'IFR',
      entryFix: 'HONIE',
      exitFix: 'ATL',
      assignedSquawk: '4521',
      requestedAltitude: 110,
      runway: '26R',
      scratchpad1: 'H26',
      scratchpad2: 'ILS',
      owner: '2P',
      wakeCategory: 'H',
      equipmentSuffix: 'L',
      pendingHandoff: '3T',
      origin: 'KMCO',
      destination: 'KATL',
    })
  })

  it('treats sentinel and blank values as absent', () => {
    const result = parseOk(
      taisMessage('A80', [
        {
          track: { trackNum: 5, lat: 33, lon: -84, acAddress: '000000' },
          flightPlan: {
            cps: 'unassigned',
            eqptSuffix: 'unavailable',
            category: 'unavailable',
            runway: '   ',
            scratchPad1: '',
            scratchPad2: ' ',
          },
        },
      ]),
    )
    const { fields } = result.updates[0]
    expect(fields.modeSCode).toBeUndefined()
    expect(fields.owner).toBeUndefined()
    expect(fields.equipmentSuffix).toBeUndefined()
    expect(fields.wakeCategory).toBeUndefined()
    expect(fields.runway).toBeUndefined()
    expect(fields.scratchpad1).toBeUndefined()
    expect(fields.scratchpad2).toBeUndefined()
  })

  it('leaves flags undefined when their elements are absent', () => {
    const { fields } = parseOk(taisMessage('A80', [positionOnly(5)])).updates[0]
    expect(fields.frozen).toBeUndefined()
    expect(fields.pseudo).toBeUndefined()
  })

  it('reads any flag value other than "1" as false', () => {
    const { fields } = parseOk(
      taisMessage('A80', [{ track: { trackNum: 5, lat: 33, lon: -84, frozen: 'true', pseudo: 1 } }]),
    ).updates[0]
    expect(fields.frozen).toBe(false)
    expect(fields.pseudo).toBe(true)
  })

  it('only derives kinematics when both velocity components are integers', () => {
    const [missingVy, decimalVx] = parseOk(
      taisMessage('A80', [
        { track: { trackNum: 1, lat: 33, lon: -84, vx: 120 } },
        { track: { trackNum: 2, lat: 33, lon: -84, vx: '12.5', vy: 100 } },
      ]),
    ).updates
    expect(missingVy.fields.groundSpeedKts).toBeUndefined()
    expect(missingVy.fields.groundTrackDeg).toBeUndefined()
    expect(decimalVx.fields.groundSpeedKts).toBeUndefined()
  })

  it('reports zero speed without a heading for a stationary target', () => {
    const { fields } = parseOk(
      taisMessage('A80', [{ track: { trackNum: 1, lat: 33, lon: -84, vx: 0, vy: 0 } }]),
    ).updates[0]
    expect(fields.groundSpeedKts).toBe(0)
    expect(fields.groundTrackDeg).toBeUndefined()
  })

  it('drops an unparseable optional number but keeps the record', () => {
    const [update] = parseOk(
      taisMessage('A80', [
        { track: { trackNum: 9, lat: 33, lon: -84, reportedAltitude: 'FL110' }, flightPlan: { acid: 'N12AB' } },
      ]),
    ).updates
    expect(update.fields.altitudeFt).toBeUndefined()
    expect(update.fields.callsign).toBe('N12AB')
  })
})
