// apps/backend/src/lib/json.ts
import { ModelJsonError } from './errors.js'

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

/**
 * Parse a model reply that should be JSON. Tries, in order: the whole text,
 * the first fenced block (```json or bare ```), then the widest {...} span.
 */
export function parseModelJson(raw: string): unknown {
  const text = raw.trim()

  const direct = tryParse(text)
  if (direct.ok) return direct.value

  const fence = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(text)
  if (fence) {
    const fenced = tryParse(fence[1].trim())
    if (fenced.ok) return fenced.value
  }

  const braces = /\{[\s\S]*\}/.exec(text)
  if (braces) {
    const spanned = tryParse(braces[0])
    if (spanned.ok) return spanned.value
  }

  throw new ModelJsonError(raw)
}
