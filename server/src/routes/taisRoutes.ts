import express, { Router } from 'express'
import { requireIngestToken } from '../auth/ingestAuth'
import type { TrackFeedService } from '../feed/trackFeedService'

export const TOPIC_HEADER = 'x-tais-topic'

type TaisRouterOptions = {
  ingestToken: string
  ingestMaxBytes: number
}

const readTopic = (req: express.Request): string | undefined => {
  const header = req.headers[TOPIC_HEADER]
  const fromHeader = Array.isArray(header) ? header[0] : header
  const fromQuery = typeof req.query.topic === 'string' ? req.query.topic : undefined
  const topic = (fromHeader ?? fromQuery)?.trim()
  return topic ? topic : undefined
}

export const createTaisRouter = (feed: TrackFeedService, options: TaisRouterOptions) => {
  const router = Router()

  router.get('/', (_req, res) => {
    try {
      res.json(feed.directory())
    } catch (error) {
      console.error('[api] failed to list facilities', error)
      res.status(500).json({ error: 'internal_error' })
    }
  })

  router.post(
    '/messages',
    requireIngestToken(options.ingestToken),
    express.text({ type: () => true, limit: options.ingestMaxBytes }),
    (req, res) => {
      try {
        const topic = readTopic(req)
        if (!topic) {
          res.status(400).json({ error: 'bad_request', message: 'topic is required' })
          return
        }
        const body: unknown = req.body
        if (typeof body !== 'string' || !body.trim()) {
          res.status(400).json({ error: 'bad_request', message: 'message body is required' })
          return
        }
        const applied = feed.processMessage(topic, body)
        res.status(202).json({ accepted: true, applied })
      } catch (error) {
        console.error('[api] failed to ingest message', error)
        res.status(500).json({ error: 'internal_error' })
      }
    },
  )

  router.all('/messages', (_req, res) => {
    res.setHeader('allow', 'POST')
    res.status(405).json({ error: 'method_not_allowed', message: 'messages only accepts POST' })
  })

  router.get('/:facility', (req, res) => {
    try {
      res.json(feed.snapshot(String(req.params.facility)))
    } catch (error) {
      console.error('[api] failed to build snapshot', error)
      res.status(500).json({ error: 'internal_error' })
    }
  })

  return router
}
