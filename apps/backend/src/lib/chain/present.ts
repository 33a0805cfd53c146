// apps/backend/src/lib/chain/present.ts
// Final step: ideas → Markdown. Runs locally so no JSON can leak to the reader.
import type { Idea } from '@creative-agent/prompts'

export const OPTION_ORDER = ['A', 'B', 'C'] as const

/** Prefix every line so multi-paragraph scripts stay inside one blockquote. */
export function quote(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => (line.trim() ? `> ${line.trim()}` : '>'))
    .join('\n')
}

export function renderIdea(idea: Idea): string {
  const notes = idea.compliance_notes?.trim() ?? ''
  const lines = [
    `### Option ${idea.label.toUpperCase()}`,
    `#### ${idea.tagline.trim()}`,
    '',
    quote(idea.script_30s.trim()),
    '',
    '**Captions**',
    `- **IG**: ${idea.captions.instagram.trim()}`,
    `- **X**: ${idea.captions.x.trim()}`,
    '',
    `**CTA**: ${idea.cta.trim()}`,
  ]
  if (notes) lines.push('', `*Compliance Notes: ${notes}*`)
  return lines.join('\n') + '\n'
}

/** Later ideas win when the model repeats a label; unlabelled ones are skipped. */
export function pickOptions(ideas: Idea[]): Idea[] {
  const byLabel = new Map<string, Idea>()
  for (const idea of ideas) byLabel.set(idea.label.toUpperCase(), idea)
  const out: Idea[] = []
  for (const label of OPTION_ORDER) {
    const idea = byLabel.get(label)
    if (idea) out.push(idea)
  }
  return out
}

export function presentIdeas(ideas: Idea[]): string {
  return pickOptions(ideas).map(renderIdea).join('\n\n')
}
