// apps/backend/src/lib/openai.ts
// One chat call per chain step. The openai client is pointed at whichever
// OpenAI-compatible endpoint the config names (Gemini by default).
import OpenAI from 'openai'
import type { LlmConfig } from './config.js'

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string }

export type ChatArgs = {
  system?: string
  messages: ChatMessage[]
  temperature?: number
  max_output_tokens?: number
  json?: boolean
  meta?: Record<string, string | number | boolean>
}

export type ChatFn = (args: ChatArgs) => Promise<string>

export function createChat(config: LlmConfig, client?: OpenAI): ChatFn {
  const openai = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL })
  const { model, trace } = config

  return async function chat(args: ChatArgs): Promise<string> {
    const {
      system,
      messages,
      temperature = 0.7,
      max_output_tokens = 4096,
      json = false,
      meta = {},
    } = args

    if (trace) {
      console.log('[chat] model=%s json=%s temp=%s max=%s', model, json, temperature, max_output_tokens)
    }

    const start = Date.now()
    console.info(JSON.stringify({
      type: 'llm.request',
      model,
      json,
      temperature,
      max_output_tokens,
      meta,
    }))

    try {
      const payload: ChatMessage[] = []
      if (system) payload.push({ role: 'system', content: system })
      payload.push(...messages)

      if (trace) {
        console.log('[chat] sending %d messages', payload.length)
      }

      const r = await openai.chat.completions.create({
        model,
        temperature,
        max_tokens: max_output_tokens,
        messages: payload,
        ...(json ? { response_format: { type: 'json_object' as const } } : {}),
      })
      const out = r.choices[0]?.message?.content ?? ''

      if (trace) {
        console.log('[chat] received %d chars', out.length)
      }
      console.info(JSON.stringify({
        type: 'llm.response',
        model,
        json,
        duration_ms: Date.now() - start,
        meta,
        usage: r.usage ?? null,
        choices: r.choices.length,
      }))
      return out.trim()
    } catch (err) {
      console.error(JSON.stringify({
        type: 'llm.error',
        model,
        json,
        duration_ms: Date.now() - start,
        meta,
        error: err instanceof Error ? err.message : String(err),
      }))
      // Surface the error so the chain can report which step failed
      throw err
    }
  }
}
