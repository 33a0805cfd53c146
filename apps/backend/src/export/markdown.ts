// apps/backend/src/export/markdown.ts
// Small Markdown → HTML renderer for the presenter's output: headings,
// blockquotes, bullet/numbered lists, bold and italic. Input is escaped first.
import { escapeHtml } from './utils.js'

const EMPTY = '<p class="empty"><em>No content provided.</em></p>'

function inline(value: string): string {
  return value
    .replace(/\*\*([^*\n]+)\*\*/g, '<strong>$1</strong>')
    .replace(/\*([^*\n]+)\*/g, '<em>$1</em>')
    .replace(/\bhttps?:\/\/[^\s<"']+/g, (m) => `<a href="${m}" target="_blank" rel="noopener">${m}</a>`)
}

export function markdownToHtml(src: string): string {
  const text = String(src || '').replace(/\r\n/g, '\n')
  if (!text.trim()) return EMPTY

  const lines = escapeHtml(text).split('\n')
  const out: string[] = []
  let list: 'ul' | 'ol' | null = null
  let para: string[] = []
  // paragraphs inside the current blockquote; null when not in one
  let quote: string[][] | null = null

  const closeList = () => {
    if (list) out.push(`</${list}>`)
    list = null
  }

  const flushPara = () => {
    if (!para.length) return
    out.push(`<p>${inline(para.join(' ').trim())}</p>`)
    para = []
  }

  const closeQuote = () => {
    if (!quote) return
    const body = quote
      .filter((p) => p.length)
      .map((p) => `<p>${inline(p.join(' '))}</p>`)
      .join('')
    out.push(`<blockquote>${body}</blockquote>`)
    quote = null
  }

  const closeAll = () => {
    closeList()
    flushPara()
    closeQuote()
  }

  for (const raw of lines) {
    const line = raw.trim()

    // escaped '>' marks a quote line
    const q = /^&gt;\s?(.*)$/.exec(line)
    if (q) {
      closeList()
      flushPara()
      if (!quote) quote = [[]]
      const body = q[1].trim()
      if (body) quote[quote.length - 1].push(body)
      else quote.push([])
      continue
    }

    if (!line) {
      closeAll()
      continue
    }
    closeQuote()

    const heading = /^(#{1,6})\s+(.+)$/.exec(line)
    if (heading) {
      closeList()
      flushPara()
      const tag = heading[1].length <= 3 ? 'h3' : 'h4'
      out.push(`<${tag}>${inline(heading[2])}</${tag}>`)
      continue
    }

    const bullet = /^[-*]\s+(.*)$/.exec(line)
    if (bullet) {
      flushPara()
      if (list !== 'ul') {
        closeList()
        out.push('<ul>')
        list = 'ul'
      }
      out.push(`<li>${inline(bullet[1])}</li>`)
      continue
    }

    const numbered = /^\d+\.\s+(.*)$/.exec(line)
    if (numbered) {
      flushPara()
      if (list !== 'ol') {
        closeList()
        out.push('<ol>')
        list = 'ol'
      }
      out.push(`<li>${inline(numbered[1])}</li>`)
      continue
    }

    closeList()
    para.push(line)
  }

  closeAll()

  return out.join('') || EMPTY
}
