import crypto from 'crypto'
import type { Request, Response, NextFunction } from 'express'

export const INGEST_TOKEN_HEADER = 'x-tais-token'

const tokensMatch = (expected: string, provided: string) => {
  const a = Buffer.from(expected)
  const b = Buffer.from(provided)
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

/**
 * Middleware guarding the forwarder ingest endpoint with a shared token.
 * With no token configured every request is refused.
 */
export const requireIngestToken = (expectedToken: string) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers[INGEST_TOKEN_HEADER]
    const provided = Array.isArray(header) ? header[0] : header

    if (!expectedToken || !provided || !tokensMatch(expectedToken, provided)) {
      res.status(401).json({ error: 'unauthorized', message: 'Missing or invalid ingest token' })
      return
    }

    next()
  }
}
