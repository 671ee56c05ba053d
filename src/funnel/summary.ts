import { formatRate, ratesForCounts, sumCounts } from './metrics.js'
import { COUNT_SLOTS, funnelTitle, slotLabel } from './model.js'
import type { FunnelType, StageCounts } from './model.js'
import type { ConversionRates } from './metrics.js'
import type { WeekDataRow } from '../store/types.js'

export interface FunnelSummary {
  funnel: FunnelType
  weeks: string[]
  totals: StageCounts
  rates: ConversionRates
  advice: string[]
}

const LOW_CVR1 = 10
const LOW_CVR4 = 30

/** Totals and CVR over the latest `weekCount` distinct reporting weeks. */
export function buildSummary(rows: WeekDataRow[], weekCount: number, funnel: FunnelType): FunnelSummary | null {
  if (rows.length === 0 || weekCount < 1) return null

  const weeks = [...new Set(rows.map(row => row.weekStart))].sort((a, b) => b.localeCompare(a)).slice(0, weekCount)
  const included = new Set(weeks)
  const totals = sumCounts(rows.filter(row => included.has(row.weekStart)).map(row => row.counts))
  const rates = ratesForCounts(totals)

  const advice: string[] = []
  if (funnel === 'active') {
    const [cvr1, , , cvr4] = rates
    if (cvr1 !== null && cvr1 < LOW_CVR1) advice.push('Low CVR1: work on the quality of your applications.')
    if (cvr4 !== null && cvr4 < LOW_CVR4) advice.push('Low CVR4: invest in onsite interview preparation.')
  }

  return { funnel, weeks, totals, rates, advice }
}

export function formatSummary(summary: FunnelSummary | null, weekCount: number): string {
  if (!summary) return 'Not enough data for a summary yet.'

  const lines = [
    `Summary for the last ${weekCount} week(s) — ${funnelTitle(summary.funnel)} funnel`,
    `Weeks: ${summary.weeks.join(', ')}`,
    '',
  ]
  for (const slot of COUNT_SLOTS) {
    lines.push(`${slotLabel(summary.funnel, slot)}: ${summary.totals[slot]}`)
  }
  lines.push('')
  summary.rates.forEach((rate, i) => lines.push(`CVR${i + 1}: ${formatRate(rate)}`))

  const offers = summary.totals.stage5
  lines.push('')
  lines.push(offers > 0
    ? `Offers received: ${offers}`
    : 'No offers yet. Keep going!')

  if (summary.advice.length > 0) {
    lines.push('')
    lines.push(...summary.advice.map(line => `• ${line}`))
  }
  return lines.join('\n')
}
