import { describe, it, expect } from 'vitest'
import type { TrackUpdate } from '@/types/tais'
import { TrackStore, createTrack } from './trackStore'

const update = (trackNum: string, fields: TrackUpdate['fields'] = {}, lat = 33.5, lon = -84.2): TrackUpdate => ({
  trackNum,
  position: { lat, lon },
  fields,
})

describe('createTrack', () => {
  it('starts with identity set and everything else empty', () => {
    const track = createTrack('A80', '1201', 5_000)
    expect(track.facility).toBe('A80')
    expect(track.trackNum).toBe('1201')
    expect(track.callsign).toBeNull()
    expect(track.groundSpeedKts).toBeNull()
    expect(track.frozen).toBe(false)
    expect(track.pseudo).toBe(false)
    expect(track.lastSeenMs).toBe(5_000)
  })
})

describe('TrackStore', () => {
  it('returns the same track for repeated getOrCreate calls', () => {
    const store = new TrackStore()
    const first = store.getOrCreate('A80', '1201')
    const second = store.getOrCreate('A80', '1201')
    expect(second).toBe(first)
    expect(store.trackCount('A80')).toBe(1)
  })

  it('keys tracks by facility', () => {
    const store = new TrackStore()
    store.getOrCreate('A80', '1201')
    store.getOrCreate('N90', '1201')
    expect(store.facilities()).toEqual(['A80', 'N90'])
    expect(store.listTracks('N90').map((track) => track.facility)).toEqual(['N90'])
  })

  it('always moves position and lastSeen', () => {
    const store = new TrackStore()
    const track = store.upsert('A80', update('1', {}, 33.1, -84.1), 1_000)
    store.update(track, update('1', {}, 33.2, -84.3), 2_000)
    expect(track.lat).toBe(33.2)
    expect(track.lon).toBe(-84.3)
    expect(track.lastSeenMs).toBe(2_000)
  })

  it('keeps stored values for fields an update leaves out', () => {
    const store = new TrackStore()
    store.upsert('A80', update('1', { callsign: 'DAL123', altitudeFt: 9000, modeSCode: 'A1B2C3' }), 1_000)
    const track = store.upsert('A80', update('1', { altitudeFt: 8500 }), 2_000)
    expect(track.callsign).toBe('DAL123')
    expect(track.modeSCode).toBe('A1B2C3')
    expect(track.altitudeFt).toBe(8500)
  })

  it('does not reset a set flag when a later update omits it', () => {
    const store = new TrackStore()
    store.upsert('A80', update('1', { frozen: true }), 1_000)
    const track = store.upsert('A80', update('1', {}), 2_000)
    expect(track.frozen).toBe(true)
    store.upsert('A80', update('1', { frozen: false }), 3_000)
    expect(track.frozen).toBe(false)
  })

  it('lists tracks of one facility only', () => {
    const store = new TrackStore()
    store.upsert('A80', update('1'))
    store.upsert('A80', update('2'))
    store.upsert('N90', update('3'))
    expect(store.listTracks('A80').map((track) => track.trackNum)).toEqual(['1', '2'])
    expect(store.listTracks('ZZZ')).toEqual([])
  })

  it('drops the facility when its last track is removed', () => {
    const store = new TrackStore()
    store.upsert('A80', update('1'))
    store.upsert('A80', update('2'))
    expect(store.remove('A80', '1')).toBe(true)
    expect(store.facilities()).toEqual(['A80'])
    expect(store.remove('A80', '2')).toBe(true)
    expect(store.facilities()).toEqual([])
    expect(store.remove('A80', '2')).toBe(false)
  })
})
