/**
 * Runtime configuration, read once from the environment at startup.
 * Invalid values fail fast with the offending variable names.
 */

import { z } from 'zod'

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY.test(value)
}

export function isValidTimezone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  STORE_KIND: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  TELEGRAM_BOT_TOKEN: z.string().default(''),
  TELEGRAM_WEBHOOK_SECRET: z.string().optional(),
  REMINDER_TIMEZONE: z.string().default('Europe/Moscow')
    .refine(isValidTimezone, 'Unknown IANA timezone'),
  REMINDER_DAILY_TIME: z.string().regex(TIME_OF_DAY, 'Expected HH:MM').default('18:00'),
  REMINDER_WEEKLY_TIME: z.string().regex(TIME_OF_DAY, 'Expected HH:MM').default('10:00'),
  // ISO weekday, 1 = Monday … 7 = Sunday
  REMINDER_WEEKLY_DAY: z.coerce.number().int().min(1).max(7).default(1),
  CHANNEL_DELETE_POLICY: z.enum(['orphan', 'cascade']).default('orphan'),
}).refine(env => env.STORE_KIND !== 'postgres' || !!env.DATABASE_URL, {
  message: 'DATABASE_URL is required when STORE_KIND=postgres',
  path: ['DATABASE_URL'],
})

export interface ReminderDefaults {
  timezone: string
  dailyTime: string
  weeklyTime: string
  weeklyDay: number
}

export interface AppConfig {
  env: string
  port: number
  store: { kind: 'postgres'; databaseUrl: string } | { kind: 'memory' }
  telegram: { botToken: string; webhookSecret?: string }
  reminders: ReminderDefaults
  channelDeletePolicy: 'orphan' | 'cascade'
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }
  const e = parsed.data
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    store: e.STORE_KIND === 'postgres' && e.DATABASE_URL
      ? { kind: 'postgres', databaseUrl: e.DATABASE_URL }
      : { kind: 'memory' },
    telegram: { botToken: e.TELEGRAM_BOT_TOKEN, webhookSecret: e.TELEGRAM_WEBHOOK_SECRET },
    reminders: {
      timezone: e.REMINDER_TIMEZONE,
      dailyTime: e.REMINDER_DAILY_TIME,
      weeklyTime: e.REMINDER_WEEKLY_TIME,
      weeklyDay: e.REMINDER_WEEKLY_DAY,
    },
    channelDeletePolicy: e.CHANNEL_DELETE_POLICY,
  }
}
