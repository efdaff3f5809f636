import type { DirectoryEntry } from '@/types/tais'
import type { TrackFeedStats } from '../src/feed/trackFeedService'
import { env } from '../src/lib/env'

const baseUrl =
  process.env.TAIS_RELAY_BASE_URL ??
  `http://${env.hostname === '0.0.0.0' ? '127.0.0.1' : env.hostname}:${env.port}`

const STAT_KEYS = ['facilities', 'tracks', 'clients', 'dirty'] as const

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const isFeedStats = (value: unknown): value is TrackFeedStats =>
  isRecord(value) && STAT_KEYS.every((key) => typeof value[key] === 'number')

const isDirectory = (value: unknown): value is DirectoryEntry[] =>
  Array.isArray(value) &&
  value.every(
    (entry) =>
      isRecord(entry) && typeof entry.facility === 'string' && typeof entry.trackCount === 'number',
  )

const getJson = async (path: string): Promise<unknown> => {
  const response = await fetch(new URL(path, baseUrl), { signal: AbortSignal.timeout(5_000) })
  if (!response.ok) {
    throw new Error(`${path} answered ${response.status}`)
  }
  return response.json()
}

const run = async () => {
  const health = await getJson('/health')
  if (!isRecord(health) || health.status !== 'ok') {
    throw new Error(`Unexpected health payload: ${JSON.stringify(health)}`)
  }
  if (!isFeedStats(health.feed)) {
    throw new Error(`Health payload is missing feed stats: ${JSON.stringify(health.feed)}`)
  }

  const directory = await getJson('/api/tais')
  if (!isDirectory(directory)) {
    throw new Error(`Unexpected directory payload: ${JSON.stringify(directory)}`)
  }
  const listed = directory.reduce((sum, entry) => sum + entry.trackCount, 0)
  if (listed !== health.feed.tracks) {
    console.warn('[smoke] directory and feed stats disagree (tracks moved between requests?)', {
      directory: listed,
      feed: health.feed.tracks,
    })
  }

  console.info('[smoke] ✅ Relay is up', {
    ...health.feed,
    busiest: directory.slice(0, 5),
  })
}

run()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('[smoke] ❌ Relay check failed:', error)
    process.exit(1)
  })
