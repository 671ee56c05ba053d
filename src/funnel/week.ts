/**
 * Week-start keys. A reporting week is identified by its Monday as YYYY-MM-DD,
 * computed on the calendar date (UTC fields) so keys never drift with the host TZ.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const DAY_MS = 24 * 60 * 60 * 1000

function formatDate(date: Date): string {
  const y = date.getUTCFullYear()
  const m = String(date.getUTCMonth() + 1).padStart(2, '0')
  const d = String(date.getUTCDate()).padStart(2, '0')
  return `${y}-${m}-${d}`
}

export function weekStartOf(date: Date): string {
  const day = date.getUTCDay()
  const offset = day === 0 ? 6 : day - 1
  const monday = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) - offset * DAY_MS)
  return formatDate(monday)
}

/** Calendar date at `now` in an IANA zone, as a UTC-midnight Date. */
export function localDateIn(now: Date, timeZone: string): Date {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now)
  const part = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find(p => p.type === type)?.value)
  return new Date(Date.UTC(part('year'), part('month') - 1, part('day')))
}

/** Week key for the user's local date rather than the UTC one. */
export function weekStartIn(now: Date, timeZone: string): string {
  return weekStartOf(localDateIn(now, timeZone))
}

export function previousWeekStart(weekStart: string): string {
  const parsed = parseIsoDate(weekStart)
  if (!parsed) throw new Error(`Invalid week start: ${weekStart}`)
  return formatDate(new Date(parsed.getTime() - 7 * DAY_MS))
}

export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim())
  if (!match) return null
  const [, y, m, d] = match
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)))
  if (formatDate(date) !== value.trim()) return null
  return date
}

/** Normalize any date in a week to that week's Monday key, or null if not a date. */
export function normalizeWeekStart(value: string): string | null {
  const date = parseIsoDate(value)
  return date ? weekStartOf(date) : null
}

export function addWeeks(date: Date, weeks: number): string {
  return formatDate(new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) + weeks * 7 * DAY_MS))
}
