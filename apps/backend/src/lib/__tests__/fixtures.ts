// Canned model replies for each chain step, keyed by the scope steps send in meta.
import type { ChatArgs, ChatFn } from '../openai.js'

export const FIXED_NOW = new Date('2026-10-19T09:00:00Z') // Monday, 12:00 in Riyadh

export const ideaA = {
  label: 'A',
  based_on_angle_id: '1',
  tagline: 'Cold water, warm city',
  script_30s: "It's 2 PM in Riyadh.\n\nYou reach for your bottle.",
  captions: { instagram: 'Cold water, warm city.', x: 'Stay cool.' },
  cta: 'Order today',
}

export const ideaB = {
  label: 'b',
  based_on_angle_id: 2,
  tagline: 'Desk hero',
  script_30s: 'Your desk, your rules.',
  captions: { instagram: 'Desk hero.', x: 'Hydrate.' },
  cta: 'Try it',
}

export const ideaC = {
  label: 'C',
  based_on_angle_id: '4',
  tagline: 'Evening walks',
  script_30s: 'Imagine a cool evening.',
  captions: { instagram: 'Evenings are back.', x: 'Walk it.' },
  cta: 'Shop now',
  compliance_notes: 'Softened claim.',
}

export const STEP_REPLIES: Record<string, unknown> = {
  'chain.brief': {
    product: 'Cycls Smart Bottle',
    description: 'Insulated bottle that keeps water cold all day',
    audience: '',
    tone: 'friendly',
    language: 'English',
    objectives: ['Drive trial'],
    constraints: [],
  },
  'chain.market': {
    market_insights: {
      cultural_moments: ['Riyadh Season'],
      local_trends: ['Evening walks'],
      target_behaviors: [],
      competitive_landscape: [],
      opportunities: ['Outdoor events'],
      seasonal_relevance: ['Mild weather'],
    },
  },
  'chain.angles': {
    angles: [
      { id: '1', title: 'Midday heat', insight: 'Still warm at noon', key_message: 'Stay cold', cultural_hook: '', timing_consideration: '' },
      { id: 2, title: 'Office days', insight: 'Long desk hours', key_message: 'Sip often', cultural_hook: '', timing_consideration: '' },
    ],
  },
  'chain.ideas': { ideas: [ideaA, ideaB, ideaC] },
  'chain.critic': { ideas: [ideaA, ideaB, ideaC] },
  'chain.compliance': { ideas: [ideaA, ideaB, ideaC] },
  // out of order on purpose; the presenter sorts A, B, C
  'chain.localize': '```json\n' + JSON.stringify({ ideas: [ideaC, ideaA, ideaB] }) + '\n```',
}

export function fakeChat(overrides: Record<string, unknown> = {}, calls: ChatArgs[] = []): ChatFn {
  const replies = { ...STEP_REPLIES, ...overrides }
  return async (args) => {
    calls.push(args)
    const scope = String(args.meta?.scope ?? '')
    const reply = replies[scope]
    if (reply === undefined) throw new Error(`no fake reply for ${scope}`)
    return typeof reply === 'string' ? reply : JSON.stringify(reply)
  }
}
