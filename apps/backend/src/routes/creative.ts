// apps/backend/src/routes/creative.ts
import { randomUUID } from 'node:crypto'
import { Router, type Response } from 'express'
import type { ChatFn } from '../lib/openai.js'
import { parseBriefInput, type BriefInput } from '../lib/brief.js'
import { buildMarketContext } from '../lib/context.js'
import { ChainStepError, MissingApiKeyError, NoIdeasError, toHttpError, type HttpError } from '../lib/errors.js'
import { runCreativeChain, type ChainProgress } from '../lib/chain/run.js'
import { markdownToHtml } from '../export/markdown.js'
import { renderPage, type FormValues, type StepTiming } from '../export/render-page.js'

export type CreativeDeps = {
  /** Resolved per request, so a missing key is reported instead of crashing boot. */
  chat: () => ChatFn
  now: () => Date
}

export type SseEvent =
  | { event: 'open'; data: { streamId: string } }
  | { event: 'step'; data: ChainProgress }
  | { event: 'done'; data: { streamId: string; markdown: string; html: string } }
  | { event: 'error'; data: { streamId: string; message: string; step?: string } }

const FORM_KEYS: ReadonlyArray<keyof FormValues> = ['product', 'description', 'audience', 'tone', 'language']

function pickFormValues(body: unknown): Partial<FormValues> {
  const src: Record<string, unknown> = body && typeof body === 'object' ? { ...body } : {}
  const out: Partial<FormValues> = {}
  for (const key of FORM_KEYS) {
    const v = src[key]
    if (typeof v === 'string') out[key] = v
  }
  return out
}

function formError(err: HttpError): string {
  if (err instanceof MissingApiKeyError || err.status === 400) return err.message
  if (err instanceof NoIdeasError || err.cause instanceof NoIdeasError) return err.message
  return `Generation failed: ${err.message}`
}

function writeSse(res: Response, e: SseEvent) {
  res.write(`event: ${e.event}\ndata: ${JSON.stringify(e.data)}\n\n`)
}

function prepareRun(
  body: unknown,
  deps: CreativeDeps
): { ok: true; input: BriefInput; chat: ChatFn } | { ok: false; error: HttpError } {
  try {
    return { ok: true, input: parseBriefInput(body), chat: deps.chat() }
  } catch (e) {
    return { ok: false, error: toHttpError(e) }
  }
}

export function createCreativeRouter(deps: CreativeDeps) {
  const router = Router()

  router.get('/', (_req, res) => {
    res.type('html').send(renderPage({ context: buildMarketContext(deps.now()) }))
  })

  router.post('/', async (req, res) => {
    const values = pickFormValues(req.body)
    const now = deps.now()
    const context = buildMarketContext(now)
    try {
      const input = parseBriefInput(values)
      const steps: StepTiming[] = []
      const result = await runCreativeChain(input, {
        chat: deps.chat(),
        now,
        onProgress: (p) => {
          if (p.status === 'done') steps.push({ label: p.label, durationMs: p.durationMs ?? 0 })
        },
      })
      res.type('html').send(renderPage({ context, values, result: { markdown: result.markdown, steps } }))
    } catch (e) {
      const err = toHttpError(e)
      res.status(err.status).type('html').send(renderPage({ context, values, error: formError(err) }))
    }
  })

  router.get('/api/context', (_req, res) => {
    res.json(buildMarketContext(deps.now()))
  })

  router.post('/api/creative/run', async (req, res, next) => {
    try {
      const input = parseBriefInput(req.body)
      const result = await runCreativeChain(input, { chat: deps.chat(), now: deps.now() })
      res.json({ result: { ...result, html: markdownToHtml(result.markdown) } })
    } catch (e) {
      next(e)
    }
  })

  router.post('/api/creative/stream', async (req, res) => {
    const prepared = prepareRun(req.body, deps)
    if (!prepared.ok) {
      res.status(prepared.error.status).json({ error: prepared.error.message })
      return
    }
    const { input, chat } = prepared

    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    })
    res.flushHeaders()

    // the run keeps going after a disconnect; its events are dropped
    let connected = true
    res.on('close', () => {
      connected = false
    })
    const send = (e: SseEvent) => {
      if (connected && !res.writableEnded) writeSse(res, e)
    }

    const streamId = randomUUID()
    send({ event: 'open', data: { streamId } })
    try {
      const result = await runCreativeChain(input, {
        chat,
        now: deps.now(),
        onProgress: (p) => send({ event: 'step', data: p }),
      })
      send({
        event: 'done',
        data: { streamId, markdown: result.markdown, html: markdownToHtml(result.markdown) },
      })
    } catch (e) {
      const err = toHttpError(e)
      send({
        event: 'error',
        data: { streamId, message: err.message, ...(e instanceof ChainStepError ? { step: e.step } : {}) },
      })
    }
    if (connected) res.end()
  })

  return router
}
