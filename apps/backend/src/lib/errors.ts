// apps/backend/src/lib/errors.ts
import OpenAI from 'openai'

/** Anything the UI or API may show to the user carries its own HTTP status. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'HttpError'
  }
}

export class MissingApiKeyError extends HttpError {
  constructor(names: readonly string[]) {
    super(503, `Missing API key. Please set ${names.join(' or ')} in the environment.`)
    this.name = 'MissingApiKeyError'
  }
}

export class ModelJsonError extends HttpError {
  constructor(readonly raw: string) {
    super(502, 'Model did not return valid JSON.')
    this.name = 'ModelJsonError'
  }
}

export class NoIdeasError extends HttpError {
  constructor() {
    super(502, 'The model returned no ideas. Please try again.')
    this.name = 'NoIdeasError'
  }
}

export class ChainStepError extends HttpError {
  constructor(readonly step: string, cause: HttpError) {
    super(cause.status, cause.message, { cause })
    this.name = 'ChainStepError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

// body-parser rejects bad payloads with a 4xx `status` and a `type` tag
const BODY_ERRORS: Record<string, string> = {
  'entity.parse.failed': 'Invalid JSON body',
  'entity.too.large': 'Request body too large',
}

function clientStatus(err: unknown): number | null {
  if (!err || typeof err !== 'object') return null
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null
}

export function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err
  if (err instanceof OpenAI.APIError) {
    const status = typeof err.status === 'number' ? err.status : 'network'
    return new HttpError(502, `Model API error (${status}): ${err.message}`, { cause: err })
  }
  const status = clientStatus(err)
  if (status !== null) {
    const type = err && typeof err === 'object' && 'type' in err ? String(err.type) : ''
    return new HttpError(status, BODY_ERRORS[type] ?? errorMessage(err), { cause: err })
  }
  return new HttpError(500, errorMessage(err) || 'INTERNAL_SERVER_ERROR', { cause: err })
}
