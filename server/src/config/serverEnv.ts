const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

const toBool = (value: string | undefined, fallback = false) => {
  if (!value) return fallback
  const normalized = value.trim().toLowerCase()
  return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

const rawEnv = process.env

export const appEnv = {
  topicPrefix: rawEnv.TAIS_TOPIC_PREFIX ?? 'TAIS/',
  flushIntervalMs: toNumber(rawEnv.FEED_FLUSH_INTERVAL_MS, 1_000),
  purgeIntervalMs: toNumber(rawEnv.FEED_PURGE_INTERVAL_MS, 10_000),
  staleAfterMs: toNumber(rawEnv.FEED_STALE_AFTER_MS, 60_000),
  clientQueueMax: toNumber(rawEnv.FEED_CLIENT_QUEUE_MAX, 256),
  pruneClosedClients: toBool(rawEnv.FEED_PRUNE_CLOSED_CLIENTS, true),
  debugFeedLogs: toBool(rawEnv.FEED_DEBUG, false),
} as const

export type AppEnv = typeof appEnv
