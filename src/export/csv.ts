/**
 * Export Generator
 *
 * CSV for spreadsheet import: UTF-8 BOM, `;` delimiter, CRLF line ends.
 * One row per (week, channel) across both funnels; the header uses the
 * requested funnel's stage labels and the Funnel column names each row's own.
 * CVR columns use the same rendering as chat.
 */

import { formatRate, ratesForCounts } from '../funnel/metrics.js'
import { COUNT_SLOTS, funnelTitle, slotLabel } from '../funnel/model.js'
import type { FunnelType } from '../funnel/model.js'
import type { WeekDataRow } from '../store/types.js'

export const CSV_BOM = '\uFEFF'
export const CSV_DELIMITER = ';'
export const CSV_EOL = '\r\n'

export function csvField(value: string | number): string {
  const text = String(value)
  return /[;"\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function csvHeader(funnel: FunnelType): string[] {
  return [
    'Week',
    'Channel',
    'Funnel',
    ...COUNT_SLOTS.map(slot => slotLabel(funnel, slot)),
    'CVR1',
    'CVR2',
    'CVR3',
    'CVR4',
  ]
}

function csvRow(row: WeekDataRow): (string | number)[] {
  return [
    row.weekStart,
    row.channel,
    funnelTitle(row.funnelType),
    ...COUNT_SLOTS.map(slot => row.counts[slot]),
    ...ratesForCounts(row.counts).map(formatRate),
  ]
}

/** Rows sorted week descending, channel ascending. Zero rows → header only. */
export function buildCsvExport(rows: WeekDataRow[], funnel: FunnelType): string {
  const sorted = [...rows].sort((a, b) =>
    b.weekStart.localeCompare(a.weekStart) || a.channel.localeCompare(b.channel))
  const lines = [csvHeader(funnel), ...sorted.map(csvRow)]
  return CSV_BOM + lines.map(line => line.map(csvField).join(CSV_DELIMITER)).join(CSV_EOL) + CSV_EOL
}

export function exportFilename(funnel: FunnelType, now: Date): string {
  return `funnel-${funnel}-${now.toISOString().slice(0, 10)}.csv`
}
