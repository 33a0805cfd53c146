// apps/backend/src/lib/context.ts
// Date, season and cultural-calendar snapshot for the KSA market.
import type { MarketContext, Season } from '@creative-agent/prompts'

export const MARKET_TIME_ZONE = 'Asia/Riyadh'

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

// Hijri-calendar moments drift ~11 days a year, so they are flagged as varying.
const CULTURAL_EVENTS: Record<number, string[]> = {
  1: ['New Year period', 'Winter shopping season'],
  2: ['Founding Day (Feb 22nd)', 'Winter activities'],
  3: ['Spring season begins', 'Outdoor activities increase', 'Ramadan season (varies yearly)'],
  4: ['Spring weather', 'Eid al-Fitr (varies yearly)'],
  5: ['End of school year approaching', 'Eid preparations (varies)'],
  6: ['Summer vacation begins', 'Travel season', 'Eid al-Adha (varies yearly)'],
  7: ['Peak summer', 'Indoor activities focus'],
  8: ['Back-to-school preparations', 'Summer sales'],
  9: ['School year begins', 'National Day (Sept 23rd)'],
  10: ['Mild weather returns', 'Outdoor events resume'],
  11: ['Pleasant weather', 'Riyadh Season events'],
  12: ['Winter season', 'Year-end shopping', 'Holiday preparations'],
}

const WEEKEND_DAYS = new Set(['Friday', 'Saturday'])

export function seasonFor(month: number): Season {
  if (month === 12 || month <= 2) return 'Winter'
  if (month <= 5) return 'Spring'
  if (month <= 8) return 'Summer'
  return 'Autumn'
}

export function culturalEventsFor(month: number): string[] {
  return [...(CULTURAL_EVENTS[month] ?? [])]
}

function zonedParts(now: Date, timeZone: string) {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    weekday: 'long',
  }).formatToParts(now)
  const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? ''
  return {
    year: Number(pick('year')),
    month: Number(pick('month')),
    day: Number(pick('day')),
    weekday: pick('weekday'),
  }
}

export function buildMarketContext(now: Date = new Date(), timeZone: string = MARKET_TIME_ZONE): MarketContext {
  const { year, month, day, weekday } = zonedParts(now, timeZone)
  const monthName = MONTH_NAMES[month - 1] ?? ''
  const season = seasonFor(month)
  const pad = (n: number) => String(n).padStart(2, '0')

  return {
    current_date: `${year}-${pad(month)}-${pad(day)}`,
    current_month: monthName,
    current_year: year,
    season,
    cultural_events: culturalEventsFor(month),
    weekday,
    is_weekend: WEEKEND_DAYS.has(weekday),
    context_note: `Current date: ${monthName} ${day}, ${year} (${season} season in KSA)`,
  }
}
