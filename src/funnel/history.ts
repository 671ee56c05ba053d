/**
 * Plain-text history table for chat display. Weeks newest first; a week with
 * more than one channel gets a TOTAL block underneath.
 */

import { formatRate, ratesForCounts, sumCounts } from './metrics.js'
import { funnelTitle, stageLabels } from './model.js'
import type { FunnelType, StageCounts } from './model.js'
import type { WeekDataRow } from '../store/types.js'

const RULE = '-'.repeat(44)

function groupByWeek(rows: WeekDataRow[]): Map<string, WeekDataRow[]> {
  const weeks = new Map<string, WeekDataRow[]>()
  for (const row of rows) {
    const bucket = weeks.get(row.weekStart) ?? []
    bucket.push(row)
    weeks.set(row.weekStart, bucket)
  }
  return weeks
}

function countsLine(name: string, counts: StageCounts): string {
  const values = [counts.stage1, counts.stage2, counts.stage3, counts.stage4, counts.stage5, counts.rejections]
  return `${name.slice(0, 10).padEnd(10)} ${values.map(v => String(v).padStart(4)).join('')}`
}

function ratesLine(counts: StageCounts): string {
  return `${'CVR'.padEnd(10)} ${ratesForCounts(counts).map(r => formatRate(r).padStart(5)).join('')}`
}

export function formatHistory(rows: WeekDataRow[], funnel: FunnelType): string {
  if (rows.length === 0) return 'No data yet. Add your first week to see history.'

  const abbreviations = stageLabels(funnel).map(label => label.slice(0, 3))
  const lines = [`History — ${funnelTitle(funnel)} funnel`, '']
  const weeks = [...groupByWeek(rows).entries()].sort(([a], [b]) => b.localeCompare(a))

  for (const [week, weekRows] of weeks) {
    lines.push(`Week ${week}`)
    lines.push(RULE)
    lines.push(`${'Channel'.padEnd(10)} ${[...abbreviations, 'Rej'].map(a => a.padStart(4)).join('')}`)
    lines.push(RULE)

    const sorted = [...weekRows].sort((a, b) => a.channel.localeCompare(b.channel))
    for (const row of sorted) {
      lines.push(countsLine(row.channel, row.counts))
      lines.push(ratesLine(row.counts))
    }

    if (sorted.length > 1) {
      const total = sumCounts(sorted.map(row => row.counts))
      lines.push(RULE)
      lines.push(countsLine('TOTAL', total))
      lines.push(ratesLine(total))
    }
    lines.push('')
  }

  return lines.join('\n').trimEnd()
}
