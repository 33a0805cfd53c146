// apps/backend/src/app.ts
import express, { type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import morgan from 'morgan'
import compression from 'compression'

import { createCreativeRouter, type CreativeDeps } from './routes/creative.js'
import { createChat } from './lib/openai.js'
import { loadLlmConfig, type ServerConfig } from './lib/config.js'
import { ChainStepError, toHttpError } from './lib/errors.js'

export type AppOptions = Partial<CreativeDeps> & {
  corsOrigins?: ServerConfig['corsOrigins']
  logRequests?: boolean
}

// gzip would hold SSE frames back until the buffer fills
function shouldCompress(req: Request, res: Response): boolean {
  if (String(res.getHeader('Content-Type') ?? '').startsWith('text/event-stream')) return false
  return compression.filter(req, res)
}

export function createApp(opts: AppOptions = {}) {
  const app = express()

  if (opts.logRequests !== false) app.use(morgan('dev'))
  app.use(cors({ origin: opts.corsOrigins ?? ['http://localhost:4000'] }))
  app.use(compression({ filter: shouldCompress }))
  app.use(express.json({ limit: '1mb' }))
  app.use(express.urlencoded({ extended: false, limit: '1mb' }))

  // Health (public)
  app.get('/api/health', (_req: Request, res: Response) =>
    res.json({ ok: true, ts: new Date().toISOString() })
  )

  app.use(
    createCreativeRouter({
      chat: opts.chat ?? (() => createChat(loadLlmConfig())),
      now: opts.now ?? (() => new Date()),
    })
  )

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const httpErr = toHttpError(err)
    if (httpErr.status >= 500) console.error('[ERROR]', err)
    res.status(httpErr.status).json({
      error: httpErr.message,
      ...(err instanceof ChainStepError ? { step: err.step } : {}),
    })
  })

  return app
}
