// apps/backend/src/export/render-page.ts
// Server-rendered form + result page. No client bundle: the form posts back
// to "/" and the whole page is re-rendered with the outcome.
import type { Language, MarketContext } from '@creative-agent/prompts'
import { markdownToHtml } from './markdown.js'
import { escapeAttr, escapeHtml } from './utils.js'

export type FormValues = {
  product: string
  description: string
  audience: string
  tone: string
  language: string
}

export type StepTiming = { label: string; durationMs: number }

export type PageModel = {
  context: MarketContext
  values?: Partial<FormValues>
  result?: { markdown: string; steps: StepTiming[] } | null
  error?: string | null
}

const LANGUAGES: Language[] = ['English', 'Arabic']

const pageStyles = `
  <style>
    :root{
      --bg:#f3f4f8;
      --page:#ffffff;
      --ink:#0f172a;
      --muted:#5b6475;
      --border:rgba(15,23,42,0.12);
      --accent:#0ea5e9;
    }
    body{
      font-family:"IBM Plex Sans","Inter","Segoe UI",sans-serif;
      background:var(--bg);
      color:var(--ink);
      margin:0;
      padding:40px 20px;
      line-height:1.55;
    }
    .page{max-width:760px;margin:0 auto;background:var(--page);border-radius:20px;padding:32px 36px;}
    h1{margin:0;font-size:30px;font-weight:600;}
    .caption{color:var(--muted);margin:4px 0 20px;}
    .info{background:#e0f2fe;border-radius:10px;padding:10px 14px;margin-bottom:20px;}
    .error{background:#fee2e2;color:#991b1b;border-radius:10px;padding:10px 14px;margin:20px 0;}
    form label{display:block;font-weight:500;margin:12px 0 4px;}
    input,textarea,select{width:100%;box-sizing:border-box;padding:8px 10px;border:1px solid var(--border);border-radius:8px;font:inherit;}
    button{margin-top:18px;background:var(--accent);color:#fff;border:0;border-radius:8px;padding:10px 20px;font:inherit;cursor:pointer;}
    .result{margin-top:28px;border-top:1px solid var(--border);padding-top:8px;}
    .result h3{margin:28px 0 4px;}
    .result h4{margin:0 0 12px;font-size:18px;}
    blockquote{margin:0 0 12px;padding:4px 16px;border-left:3px solid var(--accent);color:#334155;}
    details{margin-top:24px;color:var(--muted);}
  </style>`

function field(
  name: keyof FormValues,
  label: string,
  placeholder: string,
  values: Partial<FormValues>
): string {
  const value = values[name] ?? ''
  if (name === 'description') {
    return [
      `<label for="${name}">${escapeHtml(label)}</label>`,
      `<textarea id="${name}" name="${name}" rows="5" placeholder="${escapeAttr(placeholder)}">${escapeHtml(value)}</textarea>`,
    ].join('\n')
  }
  return [
    `<label for="${name}">${escapeHtml(label)}</label>`,
    `<input id="${name}" name="${name}" placeholder="${escapeAttr(placeholder)}" value="${escapeAttr(value)}">`,
  ].join('\n')
}

function languageSelect(current: string | undefined): string {
  const selected = current && LANGUAGES.some((l) => l === current) ? current : 'English'
  const options = LANGUAGES.map(
    (lang) => `<option value="${lang}"${lang === selected ? ' selected' : ''}>${lang}</option>`
  ).join('')
  return `<label for="language">Language</label>\n<select id="language" name="language">${options}</select>`
}

function stepList(steps: StepTiming[]): string {
  if (!steps.length) return ''
  const items = steps
    .map((s) => `<li>${escapeHtml(s.label)} <small>${Math.round(s.durationMs)}ms</small></li>`)
    .join('')
  return `<details><summary>Chain steps</summary><ol>${items}</ol></details>`
}

export function renderPage(model: PageModel): string {
  const values = model.values ?? {}
  const { context } = model
  const events = context.cultural_events.join(', ')

  const body = [
    '<main class="page">',
    '<h1>Creative Agent</h1>',
    '<p class="caption">AI-powered multi-step creative generator, tuned for the KSA market</p>',
    `<div class="info">📅 ${escapeHtml(context.context_note)} | Current events: ${escapeHtml(events)}</div>`,
    '<form method="post" action="/">',
    field('product', 'Product', 'e.g., Cycls Smart Bottle', values),
    field('description', 'Description', 'Briefly describe the product, features, or offer', values),
    field('audience', 'Audience', 'e.g., health-conscious millennials in Riyadh', values),
    field('tone', 'Tone', 'e.g., friendly, inspiring, bold', values),
    languageSelect(values.language),
    '<button type="submit">Generate</button>',
    '</form>',
    model.error ? `<div class="error" role="alert">${escapeHtml(model.error)}</div>` : '',
    model.result
      ? `<section class="result" dir="auto">${markdownToHtml(model.result.markdown)}</section>${stepList(model.result.steps)}`
      : '',
    '</main>',
  ].filter(Boolean).join('\n')

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Creative Agent</title>${pageStyles}
</head>
<body>
${body}
</body>
</html>`
}
