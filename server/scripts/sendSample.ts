import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { env } from '../src/lib/env'
import { INGEST_TOKEN_HEADER } from '../src/auth/ingestAuth'
import { TOPIC_HEADER } from '../src/routes/taisRoutes'

const baseUrl =
  process.env.TAIS_RELAY_BASE_URL ??
  `http://${env.hostname === '0.0.0.0' ? '127.0.0.1' : env.hostname}:${env.port}`

const sendSample = async () => {
  const file = process.argv[2] ?? resolve(__dirname, 'fixtures/sample-a80.xml')
  const topic = process.argv[3] ?? 'TAIS/A80/TATrackAndFlightPlan'

  if (!env.ingestToken) {
    console.error('TAIS_INGEST_TOKEN must be set to post messages')
    console.error('Usage: tsx server/scripts/sendSample.ts [file.xml] [topic]')
    process.exit(1)
  }

  const response = await fetch(new URL('/api/tais/messages', baseUrl), {
    method: 'POST',
    headers: {
      'content-type': 'application/xml',
      [INGEST_TOKEN_HEADER]: env.ingestToken,
      [TOPIC_HEADER]: topic,
    },
    body: readFileSync(file, 'utf8'),
    signal: AbortSignal.timeout(5_000),
  })
  const raw = await response.text()
  if (response.status !== 202) {
    throw new Error(`Unexpected status ${response.status}: ${raw}`)
  }
  console.info('[sample] accepted', { topic, file, response: raw })
}

sendSample()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('[sample] failed to post message:', error)
    process.exit(1)
  })
