import type { FunnelType, StageCounts, CountSlot } from '../funnel/model.js'
import type { QualifyingStage } from '../funnel/reflection-trigger.js'
import type { Profile, ReflectionAnswers } from '../types/schemas.js'

export type StoreKind = 'memory' | 'postgres'

export type ReminderFrequency = 'off' | 'daily' | 'weekly'

export type ChannelDeletePolicy = 'orphan' | 'cascade'

export interface UserRecord {
  userId: string
  username: string | null
  activeFunnel: FunnelType
  reminderFrequency: ReminderFrequency
  reminderTimezone: string | null
  reminderTime: string | null
  createdAt: Date
}

export interface ReminderSettings {
  frequency?: ReminderFrequency
  timezone?: string
  time?: string | null
}

export interface WeekKey {
  userId: string
  weekStart: string
  channel: string
}

export interface WeekDataRow extends WeekKey {
  funnelType: FunnelType
  counts: StageCounts
  createdAt: Date
  updatedAt: Date
}

/** Row state before and after a write, for the reflection trigger. */
export interface WeekDataChange {
  previous: StageCounts
  current: StageCounts
  funnelType: FunnelType
}

export interface StoredProfile extends Profile {
  userId: string
  createdAt: Date
  updatedAt: Date
}

export interface NewReflectionRecord {
  userId: string
  weekStart: string
  channel: string
  funnelType: FunnelType
  stage: QualifyingStage
  eventsCount: number
  answers: ReflectionAnswers
}

export interface ReflectionRecord extends NewReflectionRecord {
  id: string
  createdAt: Date
}

export interface ChannelRecord {
  id: string
  name: string
}

/** `channel` is the removed channel's name, null when the id matched nothing. */
export interface ChannelRemoval {
  channel: string | null
  deletedWeekRows: number
}

export interface SaveProfileOptions {
  /** Copy `preferredFunnel` onto the user's active funnel. */
  seedActiveFunnel?: boolean
}

/** A week row already holds counts from the other funnel. */
export class WeekFunnelMismatchError extends Error {
  constructor(readonly key: WeekKey, readonly storedFunnel: FunnelType, readonly submittedFunnel: FunnelType) {
    super(`Week ${key.weekStart} for ${key.channel} holds ${storedFunnel} funnel data, not ${submittedFunnel}`)
    this.name = 'WeekFunnelMismatchError'
  }
}

/**
 * Storage Layer. Every method is scoped by user id; every multi-row write is a
 * single transaction.
 */
export interface FunnelStore {
  init(): Promise<void>
  close(): Promise<void>

  ensureUser(userId: string, username?: string | null): Promise<UserRecord>
  getUser(userId: string): Promise<UserRecord | undefined>
  setActiveFunnel(userId: string, funnel: FunnelType): Promise<void>
  updateReminderSettings(userId: string, settings: ReminderSettings): Promise<void>
  listReminderUsers(): Promise<UserRecord[]>

  listChannels(userId: string): Promise<ChannelRecord[]>
  addChannel(userId: string, name: string): Promise<boolean>
  removeChannel(userId: string, channelId: string, policy: ChannelDeletePolicy): Promise<ChannelRemoval>

  /** Sums into the (user, week, channel) row; throws WeekFunnelMismatchError across funnels. */
  addWeekData(key: WeekKey, funnelType: FunnelType, counts: StageCounts): Promise<WeekDataChange>
  setWeekCount(key: WeekKey, slot: CountSlot, value: number): Promise<WeekDataChange | null>
  getWeekData(key: WeekKey): Promise<WeekDataRow | undefined>
  listWeekData(userId: string): Promise<WeekDataRow[]>

  saveProfile(userId: string, profile: Profile, options?: SaveProfileOptions): Promise<void>
  getProfile(userId: string): Promise<StoredProfile | undefined>
  deleteProfile(userId: string): Promise<boolean>

  saveReflections(records: NewReflectionRecord[]): Promise<ReflectionRecord[]>
  listReflections(userId: string, limit?: number): Promise<ReflectionRecord[]>
}
