import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest'
import { ServerResponse, type Server } from 'node:http'
import { once } from 'node:events'
import { createApp, type AppOptions } from '../../app.js'
import { MissingApiKeyError } from '../../lib/errors.js'
import { API_KEY_ENV_NAMES } from '../../lib/config.js'
import type { ChatFn } from '../../lib/openai.js'
import { fakeChat, FIXED_NOW } from '../../lib/__tests__/fixtures.js'

type Running = { server: Server; base: string; close: () => Promise<void> }

async function start(opts: AppOptions): Promise<Running> {
  const server: Server = createApp({ logRequests: false, now: () => FIXED_NOW, ...opts }).listen(0, '127.0.0.1')
  await once(server, 'listening')
  const addr = server.address()
  const port = addr && typeof addr === 'object' ? addr.port : 0
  return {
    server,
    base: `http://127.0.0.1:${port}`,
    close: async () => {
      server.closeAllConnections()
      server.close()
      await once(server, 'close')
    },
  }
}

function post(base: string, path: string, body: unknown) {
  return fetch(`${base}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  })
}

function postRaw(base: string, path: string, body: string) {
  return fetch(`${base}${path}`, { method: 'POST', headers: { 'content-type': 'application/json' }, body })
}

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

const brief = { product: 'Cycls Smart Bottle', description: 'Keeps water cold', tone: 'friendly' }

let app: Running

beforeAll(async () => {
  app = await start({ chat: () => fakeChat() })
})

afterAll(async () => {
  await app.close()
})

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('GET /api/health', () => {
  it('answers ok', async () => {
    const res = await fetch(`${app.base}/api/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ ok: true })
  })
})

describe('GET /api/context', () => {
  it('returns the market context for now', async () => {
    const res = await fetch(`${app.base}/api/context`)
    expect(await res.json()).toMatchObject({ current_date: '2026-10-19', weekday: 'Monday', is_weekend: false })
  })
})

describe('form page', () => {
  it('renders the form on GET /', async () => {
    const res = await fetch(`${app.base}/`)
    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toContain('text/html')
    const html = await res.text()
    expect(html).toContain('<form method="post" action="/">')
    expect(html).toContain('Current date: October 19, 2026 (Autumn season in KSA)')
  })

  it('runs the chain on submit and renders the options', async () => {
    const res = await fetch(`${app.base}/`, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ ...brief, audience: '', language: 'English' }).toString(),
    })
    expect(res.status).toBe(200)
    const html = await res.text()
    expect(html).toContain('<section class="result" dir="auto"><h3>Option A</h3><h4>Cold water, warm city</h4>')
    expect(html).toContain('value="Cycls Smart Bottle"')
    expect(html).toContain('<li>Formatting the final options... <small>')
  })

  it('shows a missing key without the generation prefix', async () => {
    const keyless = await start({
      chat: () => {
        throw new MissingApiKeyError(API_KEY_ENV_NAMES)
      },
    })
    try {
      const res = await fetch(`${keyless.base}/`, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(brief).toString(),
      })
      expect(res.status).toBe(503)
      const html = await res.text()
      expect(html).toContain(
        '<div class="error" role="alert">Missing API key. Please set GEMINI_API_KEY or GOOGLE_API_KEY in the environment.</div>'
      )
    } finally {
      await keyless.close()
    }
  })

  it('shows the no-ideas message as is', async () => {
    const empty = await start({ chat: () => fakeChat({ 'chain.localize': { ideas: [] } }) })
    try {
      const res = await fetch(`${empty.base}/`, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(brief).toString(),
      })
      expect(res.status).toBe(502)
      expect(await res.text()).toContain(
        '<div class="error" role="alert">The model returned no ideas. Please try again.</div>'
      )
    } finally {
      await empty.close()
    }
  })

  it('prefixes chain failures with "Generation failed"', async () => {
    const broken = await start({ chat: () => fakeChat({ 'chain.compliance': 'not json' }) })
    try {
      const res = await fetch(`${broken.base}/`, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(brief).toString(),
      })
      expect(res.status).toBe(502)
      expect(await res.text()).toContain('Generation failed: Model did not return valid JSON.')
    } finally {
      await broken.close()
    }
  })
})

describe('POST /api/creative/run', () => {
  it('returns every intermediate and the rendered Markdown', async () => {
    const res = await post(app.base, '/api/creative/run', brief)
    expect(res.status).toBe(200)
    const idea = expect.objectContaining({ tagline: expect.any(String) })
    expect(await res.json()).toMatchObject({
      result: {
        brief: { audience: 'People in Riyadh, Saudi Arabia' },
        context: { season: 'Autumn' },
        angles: [{ id: '1' }, { id: '2' }],
        ideas: { localized: [idea, idea, idea] },
        markdown: expect.stringMatching(/^### Option A\n#### Cold water, warm city\n/),
        html: expect.stringMatching(/^<h3>Option A<\/h3>/),
      },
    })
  })

  it('rejects an unsupported language', async () => {
    const res = await post(app.base, '/api/creative/run', { ...brief, language: 'French' })
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: expect.stringMatching(/^language: /) })
  })

  it('answers a malformed JSON body with 400', async () => {
    const res = await postRaw(app.base, '/api/creative/run', '{"product":')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' })
    expect(console.error).not.toHaveBeenCalled()
  })

  it('reports the failing step', async () => {
    const empty = await start({ chat: () => fakeChat({ 'chain.localize': { ideas: [] } }) })
    try {
      const res = await post(empty.base, '/api/creative/run', brief)
      expect(res.status).toBe(502)
      expect(await res.json()).toEqual({
        error: 'The model returned no ideas. Please try again.',
        step: 'present',
      })
    } finally {
      await empty.close()
    }
  })
})

describe('POST /api/creative/stream', () => {
  function frames(text: string) {
    return text
      .split('\n\n')
      .filter(Boolean)
      .map((frame) => {
        const [eventLine = '', dataLine = ''] = frame.split('\n')
        return { event: eventLine.replace('event: ', ''), data: JSON.parse(dataLine.replace('data: ', '')) }
      })
  }

  it('streams open, sixteen step events, then done', async () => {
    const res = await post(app.base, '/api/creative/stream', brief)
    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toContain('text/event-stream')
    const events = frames(await res.text())
    expect(events.map((e) => e.event)).toEqual(['open', ...Array(16).fill('step'), 'done'])
    expect(events[1]?.data).toEqual({
      step: 'brief',
      label: 'Normalizing brief...',
      index: 0,
      total: 8,
      status: 'start',
    })
    const done = events[events.length - 1]
    expect(done?.data.streamId).toBe(events[0]?.data.streamId)
    expect(done?.data.markdown.startsWith('### Option A')).toBe(true)
  })

  it('ends with an error event naming the step', async () => {
    const broken = await start({ chat: () => fakeChat({ 'chain.brief': 'nope' }) })
    try {
      const events = frames(await (await post(broken.base, '/api/creative/stream', brief)).text())
      expect(events.map((e) => e.event)).toEqual(['open', 'step', 'error'])
      expect(events[2]?.data).toMatchObject({ step: 'brief', message: 'Model did not return valid JSON.' })
    } finally {
      await broken.close()
    }
  })

  it('answers a malformed JSON body with 400', async () => {
    const res = await postRaw(app.base, '/api/creative/stream', '{"product":')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' })
  })

  it('stops writing once the client goes away', async () => {
    const market = deferred()
    const localized = deferred()
    const canned = fakeChat()
    const chat: ChatFn = async (args) => {
      if (args.meta?.scope === 'chain.market') await market.promise
      const reply = await canned(args)
      if (args.meta?.scope === 'chain.localize') localized.resolve()
      return reply
    }
    const slow = await start({ chat: () => chat })
    const socketClosed = new Promise<void>((resolve) => {
      slow.server.once('connection', (socket) => socket.once('close', () => resolve()))
    })
    const write = vi.spyOn(ServerResponse.prototype, 'write')
    try {
      const abort = new AbortController()
      const res = await fetch(`${slow.base}/api/creative/stream`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(brief),
        signal: abort.signal,
      })
      const reader = res.body?.getReader()
      if (!reader) throw new Error('stream has no body')
      const decoder = new TextDecoder()
      let text = ''
      while (!text.includes('event: step')) {
        const { value, done } = await reader.read()
        if (done) break
        text += decoder.decode(value, { stream: true })
      }
      expect(text).toContain('event: open')

      abort.abort()
      await socketClosed
      const writesBeforeClose = write.mock.calls.length

      market.resolve()
      await localized.promise
      await new Promise((resolve) => setTimeout(resolve, 20))

      expect(write.mock.calls.length).toBe(writesBeforeClose)
      expect(console.error).not.toHaveBeenCalled()
    } finally {
      write.mockRestore()
      await slow.close()
    }
  })

  it('answers validation errors as plain JSON', async () => {
    const res = await post(app.base, '/api/creative/stream', { product: 7 })
    expect(res.status).toBe(400)
    expect(res.headers.get('content-type')).toContain('application/json')
  })
})
