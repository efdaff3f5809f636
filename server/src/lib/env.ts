import { config } from 'dotenv'

// dotenv never overwrites a set variable, so server-local values load first and win.
config({ path: 'server/.env' })
config()

const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

export const env = {
  port: toNumber(process.env.PORT, 2567),
  hostname: process.env.HOST ?? '0.0.0.0',
  roomName: process.env.TAIS_ROOM_NAME ?? 'tais',
  ingestToken: process.env.TAIS_INGEST_TOKEN ?? '',
  ingestMaxBytes: toNumber(process.env.TAIS_INGEST_MAX_BYTES, 1024 * 1024),
}
