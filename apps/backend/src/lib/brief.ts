// apps/backend/src/lib/brief.ts
import { z } from 'zod'
import { LanguageEnum, type RawBrief } from '@creative-agent/prompts'
import { HttpError } from './errors.js'

export const DEFAULT_AUDIENCE = 'People in Riyadh, Saudi Arabia'

const field = z.string().trim().default('')

/** Form / API body → the raw brief step 1 receives. Blank audience gets the KSA default. */
export const BriefInputSchema = z.object({
  product: field,
  description: field,
  audience: field.transform((v) => v || DEFAULT_AUDIENCE),
  tone: field,
  language: LanguageEnum.default('English'),
})
export type BriefInput = RawBrief

export function parseBriefInput(body: unknown): BriefInput {
  const parsed = BriefInputSchema.safeParse(body ?? {})
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : ''
    throw new HttpError(400, `${where}${issue?.message ?? 'Invalid brief'}`)
  }
  return parsed.data
}
