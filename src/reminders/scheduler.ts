/**
 * Reminder Scheduler
 *
 * One process-wide cron tick per minute. Each tick re-reads opted-in users
 * from the store and sends to those whose local time matches their reminder
 * slot, so schedules survive restarts with nothing held in memory.
 *
 * Runs outside the conversation path and shares no lock with it. A failed
 * delivery is logged and the tick moves on to the next user.
 */

import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import type { ReminderDefaults } from '../config.js'
import { isValidTimezone } from '../config.js'
import type { WizardChoice } from '../conversation/wizard.js'
import type { FunnelStore, UserRecord } from '../store/types.js'
import { safeError } from '../utils/safe-log.js'

export type ReminderSender = (userId: string, text: string, choices: WizardChoice[]) => Promise<void>

export interface TickResult {
  checked: number
  due: number
  sent: number
  failed: number
}

const WEEKDAYS: Record<string, number> = { Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6, Sun: 7 }

const REMINDER_CHOICES: WizardChoice[] = [{ label: '➕ Add week data', action: 'week' }]

// ─── Due Check ──────────────────────────────────────────────────────────────

/** Wall-clock HH:MM and ISO weekday (1 = Monday) of `now` in `timeZone`. */
export function localTime(now: Date, timeZone: string): { hhmm: string; weekday: number } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
    weekday: 'short',
  }).formatToParts(now)
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? ''
  return { hhmm: `${part('hour')}:${part('minute')}`, weekday: WEEKDAYS[part('weekday')] ?? 0 }
}

export function isReminderDue(user: UserRecord, now: Date, defaults: ReminderDefaults): boolean {
  if (user.reminderFrequency === 'off') return false

  const timeZone = user.reminderTimezone && isValidTimezone(user.reminderTimezone)
    ? user.reminderTimezone
    : defaults.timezone
  const slot = user.reminderTime
    ?? (user.reminderFrequency === 'daily' ? defaults.dailyTime : defaults.weeklyTime)
  const local = localTime(now, timeZone)

  if (local.hhmm !== slot) return false
  return user.reminderFrequency === 'daily' || local.weekday === defaults.weeklyDay
}

export function reminderText(user: UserRecord): string {
  return user.reminderFrequency === 'weekly'
    ? '⏰ Weekly check-in: how did your job search go? Add the numbers for each channel.'
    : '⏰ Time to log today’s job-search numbers. It takes a minute.'
}

// ─── Scheduler ──────────────────────────────────────────────────────────────

export interface ReminderSchedulerOptions {
  store: FunnelStore
  send: ReminderSender
  defaults: ReminderDefaults
  cronExpression?: string
}

export class ReminderScheduler {
  private task: ScheduledTask | null = null
  private ticking = false

  constructor(private readonly options: ReminderSchedulerOptions) {}

  async start(): Promise<void> {
    if (this.task) return
    const users = await this.options.store.listReminderUsers()
    this.task = cron.schedule(this.options.cronExpression ?? '* * * * *', () => {
      this.tick(new Date()).catch(err => {
        console.error('[Reminders] Tick failed:', safeError(err))
      })
    })
    console.log(`[Reminders] Scheduler started: ${users.length} user(s) with reminders enabled`)
  }

  stop(): void {
    this.task?.stop()
    this.task = null
  }

  async tick(now: Date): Promise<TickResult> {
    const result: TickResult = { checked: 0, due: 0, sent: 0, failed: 0 }
    if (this.ticking) {
      console.warn('[Reminders] Previous tick still running, skipping')
      return result
    }
    this.ticking = true
    try {
      const users = await this.options.store.listReminderUsers()
      result.checked = users.length
      for (const user of users) {
        if (!isReminderDue(user, now, this.options.defaults)) continue
        result.due++
        try {
          await this.options.send(user.userId, reminderText(user), REMINDER_CHOICES)
          result.sent++
        } catch (err) {
          result.failed++
          console.error(`[Reminders] Failed to remind user=${user.userId}:`, safeError(err))
        }
      }
    } finally {
      this.ticking = false
    }
    if (result.due > 0) {
      console.log(`[Reminders] Tick: ${result.sent}/${result.due} sent, ${result.failed} failed`)
    }
    return result
  }
}
