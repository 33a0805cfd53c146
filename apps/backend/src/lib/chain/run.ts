// apps/backend/src/lib/chain/run.ts
// Runs the eight chain steps in order for one brief. Linear by construction:
// each step only sees the normalized brief and the previous step's output.
import type { Angle, Brief, Idea, MarketContext, MarketInsights } from '@creative-agent/prompts'
import type { ChatFn } from '../openai.js'
import type { BriefInput } from '../brief.js'
import { buildMarketContext } from '../context.js'
import { ChainStepError, NoIdeasError, toHttpError } from '../errors.js'
import {
  normalizeBrief,
  marketIntelligence,
  generateAngles,
  writeIdeas,
  critiqueIdeas,
  checkCompliance,
  localizeIdeas,
} from './steps.js'
import { pickOptions, presentIdeas } from './present.js'

export const CHAIN_STEPS = [
  { id: 'brief', label: 'Normalizing brief...' },
  { id: 'market', label: 'Analyzing KSA market intelligence...' },
  { id: 'angles', label: 'Generating culturally-informed creative angles...' },
  { id: 'ideas', label: 'Writing campaign ideas...' },
  { id: 'critic', label: 'Critiquing and improving ideas...' },
  { id: 'compliance', label: 'Checking compliance and cultural guidelines...' },
  { id: 'localize', label: 'Localizing and polishing...' },
  { id: 'present', label: 'Formatting the final options...' },
] as const

export type ChainStepId = (typeof CHAIN_STEPS)[number]['id']

export type ChainProgress = {
  step: ChainStepId
  label: string
  index: number
  total: number
  status: 'start' | 'done'
  durationMs?: number
}

export type ChainResult = {
  brief: Brief
  context: MarketContext
  marketInsights: MarketInsights
  angles: Angle[]
  ideas: {
    drafted: Idea[]
    improved: Idea[]
    compliant: Idea[]
    localized: Idea[]
  }
  markdown: string
}

export type RunOptions = {
  chat: ChatFn
  now?: Date
  onProgress?: (event: ChainProgress) => void
}

export async function runCreativeChain(input: BriefInput, opts: RunOptions): Promise<ChainResult> {
  const { chat, onProgress } = opts
  const context = buildMarketContext(opts.now ?? new Date())

  async function step<T>(id: ChainStepId, fn: () => Promise<T> | T): Promise<T> {
    const index = CHAIN_STEPS.findIndex((s) => s.id === id)
    const { label } = CHAIN_STEPS[index]
    const total = CHAIN_STEPS.length
    onProgress?.({ step: id, label, index, total, status: 'start' })
    const start = Date.now()
    try {
      const out = await fn()
      const durationMs = Date.now() - start
      console.log(`[chain] ${id} • ${durationMs}ms`)
      onProgress?.({ step: id, label, index, total, status: 'done', durationMs })
      return out
    } catch (err) {
      console.error(`[chain] ${id} failed after ${Date.now() - start}ms`)
      throw new ChainStepError(id, toHttpError(err))
    }
  }

  const brief = await step('brief', () => normalizeBrief(chat, input))
  const marketInsights = await step('market', () => marketIntelligence(chat, brief, context))
  const angles = await step('angles', () => generateAngles(chat, brief, marketInsights, context))
  const drafted = await step('ideas', () => writeIdeas(chat, brief, angles))
  const improved = await step('critic', () => critiqueIdeas(chat, brief, drafted))
  const compliant = await step('compliance', () => checkCompliance(chat, brief, improved))
  const localized = await step('localize', () => localizeIdeas(chat, brief, compliant))

  const markdown = await step('present', () => {
    if (!pickOptions(localized).length) throw new NoIdeasError()
    return presentIdeas(localized)
  })

  return {
    brief,
    context,
    marketInsights,
    angles,
    ideas: { drafted, improved, compliant, localized },
    markdown,
  }
}
