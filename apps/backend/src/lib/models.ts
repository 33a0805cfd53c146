// apps/backend/src/lib/models.ts
// Centralised model resolution so every chain step shares one default.

const FALLBACK_MODEL = 'gemini-2.0-flash'

export function resolveModel(...candidates: Array<string | undefined | null>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) {
      return candidate.trim()
    }
  }
  return FALLBACK_MODEL
}

export function defaultModel(env: NodeJS.ProcessEnv = process.env): string {
  return resolveModel(env.MODEL_DEFAULT)
}
