import { Server as ColyseusServer } from 'colyseus'
import express from 'express'
import { createServer } from 'http'
import { env } from './lib/env'
import { trackFeed } from './feed/trackFeedService'
import { FacilityRoom } from './rooms/FacilityRoom'
import { createTaisRouter } from './routes/taisRoutes'

const expressApp = express()

expressApp.use((_req, res, next) => {
  res.setHeader('access-control-allow-origin', '*')
  next()
})

expressApp.get('/', (_req, res) => {
  res.json({
    service: 'TAIS Track Relay',
    room: env.roomName,
    status: 'ok',
  })
})

expressApp.get('/health', (_req, res) => {
  res.json({ status: 'ok', uptime: process.uptime(), feed: trackFeed.stats() })
})

expressApp.use(
  '/api/tais',
  createTaisRouter(trackFeed, {
    ingestToken: env.ingestToken,
    ingestMaxBytes: env.ingestMaxBytes,
  }),
)

const httpServer = createServer(expressApp)

const gameServer = new ColyseusServer({
  server: httpServer,
  gracefullyShutdown: false,
})

gameServer.define(env.roomName, FacilityRoom).filterBy(['facility'])

const start = async () => {
  try {
    if (!env.ingestToken) {
      console.warn('[tais] TAIS_INGEST_TOKEN is not set; the ingest endpoint will refuse all messages')
    }
    trackFeed.start()
    await gameServer.listen(env.port, env.hostname)
    console.log(`[colyseus] listening on ${env.hostname}:${env.port} (room: ${env.roomName})`)
  } catch (error) {
    console.error('[colyseus] failed to start server', error)
    process.exit(1)
  }
}

const shutdown = () => {
  trackFeed.stop()
  gameServer
    .gracefullyShutdown(false)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('[colyseus] shutdown failed', error)
      process.exit(1)
    })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

void start()
