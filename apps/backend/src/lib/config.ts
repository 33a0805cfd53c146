// apps/backend/src/lib/config.ts
import { MissingApiKeyError } from './errors.js'
import { defaultModel } from './models.js'

export const API_KEY_ENV_NAMES = ['GEMINI_API_KEY', 'GOOGLE_API_KEY'] as const

// Gemini speaks the chat-completions dialect here, so the openai client works unchanged.
export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/'

export type LlmConfig = {
  apiKey: string
  baseURL: string
  model: string
  trace: boolean
}

/** First non-blank key wins; '' when neither is set. */
export function readApiKey(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of API_KEY_ENV_NAMES) {
    const value = env[name]?.trim()
    if (value) return value
  }
  return ''
}

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  const apiKey = readApiKey(env)
  if (!apiKey) throw new MissingApiKeyError(API_KEY_ENV_NAMES)
  return {
    apiKey,
    baseURL: env.LLM_BASE_URL?.trim() || DEFAULT_BASE_URL,
    model: defaultModel(env),
    trace: env.LLM_TRACE?.trim() === '1',
  }
}

export type ServerConfig = {
  port: number
  corsOrigins: string[]
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || 4000)
  return {
    port: Number.isFinite(port) ? port : 4000,
    corsOrigins: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean)
      : ['http://localhost:4000'],
  }
}
