// apps/backend/src/lib/chain/steps.ts
// The seven model-backed chain steps. Each formats its payload with the
// matching prompt module, asks for JSON, and coerces the reply.
import type { z } from 'zod'
import {
  system,
  normalizer,
  market,
  angles as anglesPrompt,
  ideas as ideasPrompt,
  critic,
  compliance,
  localize,
  BriefSchema,
  MarketIntelligenceSchema,
  AnglesSchema,
  IdeasSchema,
  type Angle,
  type Brief,
  type Idea,
  type MarketContext,
  type MarketInsights,
  type RawBrief,
} from '@creative-agent/prompts'
import type { ChatFn } from '../openai.js'
import { parseModelJson } from '../json.js'
import { ModelJsonError } from '../errors.js'

async function callJson<S extends z.ZodTypeAny>(
  chat: ChatFn,
  scope: string,
  prompt: string,
  temperature: number,
  schema: S
): Promise<z.output<S>> {
  const raw = await chat({
    system,
    messages: [{ role: 'user', content: prompt }],
    temperature,
    json: true,
    meta: { scope },
  })
  const parsed = schema.safeParse(parseModelJson(raw))
  // Lenient schemas only reject non-objects (a bare string, an array, null)
  if (!parsed.success) throw new ModelJsonError(raw)
  return parsed.data
}

/** Anything the model leaves blank falls back to what the user typed. */
export async function normalizeBrief(chat: ChatFn, input: RawBrief): Promise<Brief> {
  const out = await callJson(
    chat,
    'chain.brief',
    normalizer.buildPrompt(input),
    normalizer.temperature,
    BriefSchema
  )
  return {
    ...out,
    product: out.product || input.product,
    description: out.description || input.description,
    audience: out.audience || input.audience,
    tone: out.tone || input.tone,
    // the form's select is authoritative
    language: input.language,
  }
}

export async function marketIntelligence(
  chat: ChatFn,
  brief: Brief,
  context: MarketContext
): Promise<MarketInsights> {
  const out = await callJson(
    chat,
    'chain.market',
    market.buildPrompt({ brief, current_context: context }),
    market.temperature,
    MarketIntelligenceSchema
  )
  return out.market_insights
}

export async function generateAngles(
  chat: ChatFn,
  brief: Brief,
  insights: MarketInsights,
  context: MarketContext
): Promise<Angle[]> {
  const out = await callJson(
    chat,
    'chain.angles',
    anglesPrompt.buildPrompt({ brief, market_insights: insights, current_context: context }),
    anglesPrompt.temperature,
    AnglesSchema
  )
  return out.angles
}

export async function writeIdeas(chat: ChatFn, brief: Brief, angles: Angle[]): Promise<Idea[]> {
  const out = await callJson(
    chat,
    'chain.ideas',
    ideasPrompt.buildPrompt({ brief, angles }),
    ideasPrompt.temperature,
    IdeasSchema
  )
  return out.ideas
}

export async function critiqueIdeas(chat: ChatFn, brief: Brief, ideas: Idea[]): Promise<Idea[]> {
  const out = await callJson(
    chat,
    'chain.critic',
    critic.buildPrompt({ brief, ideas }),
    critic.temperature,
    IdeasSchema
  )
  return out.ideas
}

export async function checkCompliance(chat: ChatFn, brief: Brief, ideas: Idea[]): Promise<Idea[]> {
  const out = await callJson(
    chat,
    'chain.compliance',
    compliance.buildPrompt({ brief, ideas }),
    compliance.temperature,
    IdeasSchema
  )
  return out.ideas
}

export async function localizeIdeas(chat: ChatFn, brief: Brief, ideas: Idea[]): Promise<Idea[]> {
  const out = await callJson(
    chat,
    'chain.localize',
    localize.buildPrompt({ language: brief.language, tone: brief.tone, ideas }),
    localize.temperature,
    IdeasSchema
  )
  return out.ideas
}
