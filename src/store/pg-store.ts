/**
 * Postgres Funnel Store
 *
 * Raw SQL over the shared pool. Multi-row writes go through withTransaction()
 * so one logical submission commits together. JSONB columns are validated
 * with zod on read; nothing untyped leaves this file.
 */

import { randomUUID } from 'node:crypto'
import { COUNT_SLOTS, addCounts, emptyCounts, isFunnelType } from '../funnel/model.js'
import type { CountSlot, FunnelType, StageCounts } from '../funnel/model.js'
import { QUALIFYING_SLOTS } from '../funnel/reflection-trigger.js'
import type { QualifyingStage } from '../funnel/reflection-trigger.js'
import { ProfileExtrasSchema, ReflectionAnswersSchema } from '../types/schemas.js'
import type { Profile, ProfileExtras } from '../types/schemas.js'
import { getPool, withTransaction } from './pool.js'
import { WeekFunnelMismatchError } from './types.js'
import type {
  ChannelDeletePolicy,
  ChannelRecord,
  ChannelRemoval,
  FunnelStore,
  NewReflectionRecord,
  ReflectionRecord,
  ReminderFrequency,
  ReminderSettings,
  SaveProfileOptions,
  StoredProfile,
  UserRecord,
  WeekDataChange,
  WeekDataRow,
  WeekKey,
} from './types.js'

// ─── DB Row Types ───────────────────────────────────────────────────────────

interface UserRow {
  user_id: string
  username: string | null
  active_funnel: string
  reminder_frequency: string
  reminder_timezone: string | null
  reminder_time: string | null
  created_at: Date
}

interface WeekDataDbRow {
  user_id: string
  week_start: string
  channel_name: string
  funnel_type: string
  stage1: number
  stage2: number
  stage3: number
  stage4: number
  stage5: number
  rejections: number
  created_at: Date
  updated_at: Date
}

interface ProfileRow {
  user_id: string
  role: string
  current_location: string
  target_location: string
  level: string
  deadline_weeks: number
  target_end_date: string
  preferred_funnel: string
  extras: unknown
  linkedin_url: string | null
  created_at: Date
  updated_at: Date
}

interface ReflectionRow {
  id: string
  user_id: string
  week_start: string
  channel_name: string
  funnel_type: string
  stage: string
  events_count: number
  answers: unknown
  created_at: Date
}

const USER_COLUMNS = `user_id, username, active_funnel, reminder_frequency,
  reminder_timezone, reminder_time, created_at`

const WEEK_COLUMNS = `user_id, week_start, channel_name, funnel_type,
  stage1, stage2, stage3, stage4, stage5, rejections, created_at, updated_at`

// Whitelist for slot → column; slot names are never interpolated unchecked.
const COLUMN_BY_SLOT: Record<CountSlot, string> = {
  stage1: 'stage1',
  stage2: 'stage2',
  stage3: 'stage3',
  stage4: 'stage4',
  stage5: 'stage5',
  rejections: 'rejections',
}

// ─── Migrations ─────────────────────────────────────────────────────────────

/**
 * Idempotent schema setup. Columns added after the first release use
 * ADD COLUMN IF NOT EXISTS so existing tables keep their rows.
 */
export async function runMigrations(): Promise<void> {
  const p = getPool()
  await p.query(`
    CREATE TABLE IF NOT EXISTS users (
      user_id             TEXT PRIMARY KEY,
      username            TEXT,
      active_funnel       TEXT NOT NULL DEFAULT 'active',
      reminder_frequency  TEXT NOT NULL DEFAULT 'off',
      created_at          TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  await p.query(`ALTER TABLE users ADD COLUMN IF NOT EXISTS reminder_timezone TEXT`)
  await p.query(`ALTER TABLE users ADD COLUMN IF NOT EXISTS reminder_time TEXT`)

  await p.query(`
    CREATE TABLE IF NOT EXISTS user_channels (
      id            BIGSERIAL PRIMARY KEY,
      user_id       TEXT NOT NULL REFERENCES users(user_id),
      channel_name  TEXT NOT NULL,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (user_id, channel_name)
    )
  `)

  await p.query(`
    CREATE TABLE IF NOT EXISTS week_data (
      id            BIGSERIAL PRIMARY KEY,
      user_id       TEXT NOT NULL REFERENCES users(user_id),
      week_start    TEXT NOT NULL,
      channel_name  TEXT NOT NULL,
      funnel_type   TEXT NOT NULL,
      stage1        INTEGER NOT NULL DEFAULT 0 CHECK (stage1 >= 0),
      stage2        INTEGER NOT NULL DEFAULT 0 CHECK (stage2 >= 0),
      stage3        INTEGER NOT NULL DEFAULT 0 CHECK (stage3 >= 0),
      stage4        INTEGER NOT NULL DEFAULT 0 CHECK (stage4 >= 0),
      stage5        INTEGER NOT NULL DEFAULT 0 CHECK (stage5 >= 0),
      rejections    INTEGER NOT NULL DEFAULT 0 CHECK (rejections >= 0),
      created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (user_id, week_start, channel_name)
    )
  `)

  await p.query(`
    CREATE TABLE IF NOT EXISTS profiles (
      user_id           TEXT PRIMARY KEY REFERENCES users(user_id),
      role              TEXT NOT NULL,
      current_location  TEXT NOT NULL,
      target_location   TEXT NOT NULL,
      level             TEXT NOT NULL,
      deadline_weeks    INTEGER NOT NULL,
      target_end_date   TEXT NOT NULL,
      preferred_funnel  TEXT NOT NULL DEFAULT 'active',
      extras            JSONB NOT NULL DEFAULT '{}'::jsonb,
      created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  await p.query(`ALTER TABLE profiles ADD COLUMN IF NOT EXISTS linkedin_url TEXT`)

  await p.query(`
    CREATE TABLE IF NOT EXISTS reflections (
      id            UUID PRIMARY KEY,
      user_id       TEXT NOT NULL REFERENCES users(user_id),
      week_start    TEXT NOT NULL,
      channel_name  TEXT NOT NULL,
      funnel_type   TEXT NOT NULL,
      stage         TEXT NOT NULL,
      events_count  INTEGER NOT NULL,
      answers       JSONB NOT NULL,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
  await p.query(`
    CREATE INDEX IF NOT EXISTS idx_reflections_ctx
    ON reflections(user_id, week_start, channel_name, stage)
  `)
  console.log('[DB] Migrations complete')
}

// ─── Row → Record Conversion ────────────────────────────────────────────────

function toFunnel(value: string): FunnelType {
  return isFunnelType(value) ? value : 'active'
}

function toFrequency(value: string): ReminderFrequency {
  return value === 'daily' || value === 'weekly' ? value : 'off'
}

function toUser(row: UserRow): UserRecord {
  return {
    userId: row.user_id,
    username: row.username,
    activeFunnel: toFunnel(row.active_funnel),
    reminderFrequency: toFrequency(row.reminder_frequency),
    reminderTimezone: row.reminder_timezone,
    reminderTime: row.reminder_time,
    createdAt: row.created_at,
  }
}

function countsOf(row: WeekDataDbRow): StageCounts {
  return {
    stage1: row.stage1,
    stage2: row.stage2,
    stage3: row.stage3,
    stage4: row.stage4,
    stage5: row.stage5,
    rejections: row.rejections,
  }
}

function toWeekRow(row: WeekDataDbRow): WeekDataRow {
  return {
    userId: row.user_id,
    weekStart: row.week_start,
    channel: row.channel_name,
    funnelType: toFunnel(row.funnel_type),
    counts: countsOf(row),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function parseExtras(userId: string, value: unknown): ProfileExtras {
  const parsed = ProfileExtrasSchema.safeParse(value ?? {})
  if (parsed.success) return parsed.data
  console.warn(`[DB] Ignoring malformed profile extras for user=${userId}`)
  return {}
}

function toProfile(row: ProfileRow): StoredProfile {
  return {
    userId: row.user_id,
    role: row.role,
    currentLocation: row.current_location,
    targetLocation: row.target_location,
    level: row.level,
    deadlineWeeks: row.deadline_weeks,
    targetEndDate: row.target_end_date,
    preferredFunnel: toFunnel(row.preferred_funnel),
    ...parseExtras(row.user_id, row.extras),
    ...(row.linkedin_url ? { linkedinUrl: row.linkedin_url } : {}),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toStage(value: string): QualifyingStage | null {
  return QUALIFYING_SLOTS.find(entry => entry.stage === value)?.stage ?? null
}

function toReflection(row: ReflectionRow): ReflectionRecord | null {
  const stage = toStage(row.stage)
  const answers = ReflectionAnswersSchema.safeParse(row.answers)
  if (!answers.success || !stage) {
    console.warn(`[DB] Skipping reflection ${row.id}: stored row failed validation`)
    return null
  }
  return {
    id: row.id,
    userId: row.user_id,
    weekStart: row.week_start,
    channel: row.channel_name,
    funnelType: toFunnel(row.funnel_type),
    stage,
    eventsCount: row.events_count,
    answers: answers.data,
    createdAt: row.created_at,
  }
}

function extrasOf(profile: Profile): ProfileExtras {
  return {
    roleSynonyms: profile.roleSynonyms,
    salary: profile.salary,
    companyTypes: profile.companyTypes,
    industries: profile.industries,
    competencies: profile.competencies,
    superpowers: profile.superpowers,
    constraints: profile.constraints,
  }
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class PgFunnelStore implements FunnelStore {
  async init(): Promise<void> {
    await runMigrations()
  }

  async close(): Promise<void> {
    // Pool lifecycle is owned by the entry point (closeDatabase()).
  }

  async ensureUser(userId: string, username: string | null = null): Promise<UserRecord> {
    const { rows } = await getPool().query<UserRow>(
      `INSERT INTO users (user_id, username)
       VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE
         SET username = COALESCE(EXCLUDED.username, users.username)
       RETURNING ${USER_COLUMNS}`,
      [userId, username],
    )
    return toUser(rows[0])
  }

  async getUser(userId: string): Promise<UserRecord | undefined> {
    const { rows } = await getPool().query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE user_id = $1`,
      [userId],
    )
    return rows.length > 0 ? toUser(rows[0]) : undefined
  }

  async setActiveFunnel(userId: string, funnel: FunnelType): Promise<void> {
    await getPool().query(`UPDATE users SET active_funnel = $2 WHERE user_id = $1`, [userId, funnel])
  }

  async updateReminderSettings(userId: string, settings: ReminderSettings): Promise<void> {
    await getPool().query(
      `UPDATE users
       SET reminder_frequency = COALESCE($2, reminder_frequency),
           reminder_timezone  = COALESCE($3, reminder_timezone),
           reminder_time      = CASE WHEN $4::boolean THEN $5 ELSE reminder_time END
       WHERE user_id = $1`,
      [userId, settings.frequency ?? null, settings.timezone ?? null, settings.time !== undefined, settings.time ?? null],
    )
  }

  async listReminderUsers(): Promise<UserRecord[]> {
    const { rows } = await getPool().query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE reminder_frequency IN ('daily', 'weekly')`,
    )
    return rows.map(toUser)
  }

  async listChannels(userId: string): Promise<ChannelRecord[]> {
    // BIGSERIAL ids come back from pg as strings.
    const { rows } = await getPool().query<{ id: string; channel_name: string }>(
      `SELECT id, channel_name FROM user_channels WHERE user_id = $1 ORDER BY created_at, id`,
      [userId],
    )
    return rows.map(row => ({ id: row.id, name: row.channel_name }))
  }

  async addChannel(userId: string, name: string): Promise<boolean> {
    const result = await getPool().query(
      `INSERT INTO user_channels (user_id, channel_name)
       VALUES ($1, $2)
       ON CONFLICT (user_id, channel_name) DO NOTHING`,
      [userId, name],
    )
    return (result.rowCount ?? 0) > 0
  }

  async removeChannel(userId: string, channelId: string, policy: ChannelDeletePolicy): Promise<ChannelRemoval> {
    if (!/^\d+$/.test(channelId)) return { channel: null, deletedWeekRows: 0 }
    return withTransaction(async client => {
      const removed = await client.query<{ channel_name: string }>(
        `DELETE FROM user_channels WHERE user_id = $1 AND id = $2 RETURNING channel_name`,
        [userId, channelId],
      )
      if (removed.rows.length === 0) return { channel: null, deletedWeekRows: 0 }
      const name = removed.rows[0].channel_name

      let deletedWeekRows = 0
      if (policy === 'cascade') {
        const deleted = await client.query(
          `DELETE FROM week_data WHERE user_id = $1 AND channel_name = $2`,
          [userId, name],
        )
        deletedWeekRows = deleted.rowCount ?? 0
      }
      return { channel: name, deletedWeekRows }
    })
  }

  async addWeekData(key: WeekKey, funnelType: FunnelType, counts: StageCounts): Promise<WeekDataChange> {
    return withTransaction(async client => {
      const existing = await client.query<WeekDataDbRow>(
        `SELECT ${WEEK_COLUMNS} FROM week_data
         WHERE user_id = $1 AND week_start = $2 AND channel_name = $3
         FOR UPDATE`,
        [key.userId, key.weekStart, key.channel],
      )
      const stored = existing.rows.length > 0 ? existing.rows[0] : undefined
      if (stored && toFunnel(stored.funnel_type) !== funnelType) {
        throw new WeekFunnelMismatchError(key, toFunnel(stored.funnel_type), funnelType)
      }
      const previous = stored ? countsOf(stored) : emptyCounts()

      const { rows } = await client.query<WeekDataDbRow>(
        `INSERT INTO week_data
           (user_id, week_start, channel_name, funnel_type,
            stage1, stage2, stage3, stage4, stage5, rejections)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (user_id, week_start, channel_name) DO UPDATE
           SET stage1 = week_data.stage1 + EXCLUDED.stage1,
               stage2 = week_data.stage2 + EXCLUDED.stage2,
               stage3 = week_data.stage3 + EXCLUDED.stage3,
               stage4 = week_data.stage4 + EXCLUDED.stage4,
               stage5 = week_data.stage5 + EXCLUDED.stage5,
               rejections = week_data.rejections + EXCLUDED.rejections,
               updated_at = NOW()
         RETURNING ${WEEK_COLUMNS}`,
        [
          key.userId, key.weekStart, key.channel, funnelType,
          ...COUNT_SLOTS.map(slot => counts[slot]),
        ],
      )
      const current = rows.length > 0 ? countsOf(rows[0]) : addCounts(previous, counts)
      return { previous, current, funnelType }
    })
  }

  async setWeekCount(key: WeekKey, slot: CountSlot, value: number): Promise<WeekDataChange | null> {
    const column = COLUMN_BY_SLOT[slot]
    return withTransaction(async client => {
      const existing = await client.query<WeekDataDbRow>(
        `SELECT ${WEEK_COLUMNS} FROM week_data
         WHERE user_id = $1 AND week_start = $2 AND channel_name = $3
         FOR UPDATE`,
        [key.userId, key.weekStart, key.channel],
      )
      if (existing.rows.length === 0) return null

      const { rows } = await client.query<WeekDataDbRow>(
        `UPDATE week_data
         SET ${column} = $4, updated_at = NOW()
         WHERE user_id = $1 AND week_start = $2 AND channel_name = $3
         RETURNING ${WEEK_COLUMNS}`,
        [key.userId, key.weekStart, key.channel, value],
      )
      return {
        previous: countsOf(existing.rows[0]),
        current: countsOf(rows[0]),
        funnelType: toFunnel(rows[0].funnel_type),
      }
    })
  }

  async getWeekData(key: WeekKey): Promise<WeekDataRow | undefined> {
    const { rows } = await getPool().query<WeekDataDbRow>(
      `SELECT ${WEEK_COLUMNS} FROM week_data
       WHERE user_id = $1 AND week_start = $2 AND channel_name = $3`,
      [key.userId, key.weekStart, key.channel],
    )
    return rows.length > 0 ? toWeekRow(rows[0]) : undefined
  }

  async listWeekData(userId: string): Promise<WeekDataRow[]> {
    const { rows } = await getPool().query<WeekDataDbRow>(
      `SELECT ${WEEK_COLUMNS} FROM week_data
       WHERE user_id = $1
       ORDER BY week_start DESC, channel_name`,
      [userId],
    )
    return rows.map(toWeekRow)
  }

  async saveProfile(userId: string, profile: Profile, options: SaveProfileOptions = {}): Promise<void> {
    await withTransaction(async client => {
      await client.query(
        `INSERT INTO users (user_id) VALUES ($1) ON CONFLICT (user_id) DO NOTHING`,
        [userId],
      )
      await client.query(
        `INSERT INTO profiles
           (user_id, role, current_location, target_location, level,
            deadline_weeks, target_end_date, preferred_funnel, extras, linkedin_url)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9::jsonb, $10)
         ON CONFLICT (user_id) DO UPDATE
           SET role = EXCLUDED.role,
               current_location = EXCLUDED.current_location,
               target_location = EXCLUDED.target_location,
               level = EXCLUDED.level,
               deadline_weeks = EXCLUDED.deadline_weeks,
               target_end_date = EXCLUDED.target_end_date,
               preferred_funnel = EXCLUDED.preferred_funnel,
               extras = EXCLUDED.extras,
               linkedin_url = EXCLUDED.linkedin_url,
               updated_at = NOW()`,
        [
          userId, profile.role, profile.currentLocation, profile.targetLocation, profile.level,
          profile.deadlineWeeks, profile.targetEndDate, profile.preferredFunnel,
          JSON.stringify(extrasOf(profile)), profile.linkedinUrl ?? null,
        ],
      )
      if (options.seedActiveFunnel) {
        await client.query(
          `UPDATE users SET active_funnel = $2 WHERE user_id = $1`,
          [userId, profile.preferredFunnel],
        )
      }
    })
  }

  async getProfile(userId: string): Promise<StoredProfile | undefined> {
    const { rows } = await getPool().query<ProfileRow>(
      `SELECT user_id, role, current_location, target_location, level, deadline_weeks,
              target_end_date, preferred_funnel, extras, linkedin_url, created_at, updated_at
       FROM profiles WHERE user_id = $1`,
      [userId],
    )
    return rows.length > 0 ? toProfile(rows[0]) : undefined
  }

  async deleteProfile(userId: string): Promise<boolean> {
    const result = await getPool().query(`DELETE FROM profiles WHERE user_id = $1`, [userId])
    return (result.rowCount ?? 0) > 0
  }

  async saveReflections(records: NewReflectionRecord[]): Promise<ReflectionRecord[]> {
    if (records.length === 0) return []
    return withTransaction(async client => {
      const saved: ReflectionRecord[] = []
      for (const record of records) {
        const id = randomUUID()
        const { rows } = await client.query<{ created_at: Date }>(
          `INSERT INTO reflections
             (id, user_id, week_start, channel_name, funnel_type, stage, events_count, answers)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
           RETURNING created_at`,
          [
            id, record.userId, record.weekStart, record.channel, record.funnelType,
            record.stage, record.eventsCount, JSON.stringify(record.answers),
          ],
        )
        saved.push({ ...record, id, createdAt: rows[0].created_at })
      }
      return saved
    })
  }

  async listReflections(userId: string, limit = 10): Promise<ReflectionRecord[]> {
    const { rows } = await getPool().query<ReflectionRow>(
      `SELECT id, user_id, week_start, channel_name, funnel_type, stage, events_count, answers, created_at
       FROM reflections
       WHERE user_id = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [userId, limit],
    )
    return rows.map(toReflection).filter((record): record is ReflectionRecord => record !== null)
  }
}
