import { randomUUID } from 'node:crypto'
import { addCounts, emptyCounts } from '../funnel/model.js'
import type { CountSlot, FunnelType, StageCounts } from '../funnel/model.js'
import type { Profile } from '../types/schemas.js'
import { WeekFunnelMismatchError } from './types.js'
import type {
  ChannelDeletePolicy,
  ChannelRecord,
  ChannelRemoval,
  FunnelStore,
  NewReflectionRecord,
  ReflectionRecord,
  ReminderSettings,
  SaveProfileOptions,
  StoredProfile,
  UserRecord,
  WeekDataChange,
  WeekDataRow,
  WeekKey,
} from './types.js'

function weekKeyId(key: WeekKey): string {
  return `${key.userId}\u0000${key.weekStart}\u0000${key.channel}`
}

function compareWeekRows(a: WeekDataRow, b: WeekDataRow): number {
  return b.weekStart.localeCompare(a.weekStart) || a.channel.localeCompare(b.channel)
}

/**
 * Process-local store used by tests and by `STORE_KIND=memory`. Values are
 * copied in and out so callers can't mutate stored rows.
 */
export class InMemoryFunnelStore implements FunnelStore {
  users = new Map<string, UserRecord>()
  channelsByUser = new Map<string, ChannelRecord[]>()
  private nextChannelId = 1
  weekData = new Map<string, WeekDataRow>()
  profiles = new Map<string, StoredProfile>()
  reflections: ReflectionRecord[] = []

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async ensureUser(userId: string, username: string | null = null): Promise<UserRecord> {
    const existing = this.users.get(userId)
    if (existing) {
      if (username && existing.username !== username) existing.username = username
      return { ...existing }
    }
    const user: UserRecord = {
      userId,
      username,
      activeFunnel: 'active',
      reminderFrequency: 'off',
      reminderTimezone: null,
      reminderTime: null,
      createdAt: new Date(),
    }
    this.users.set(userId, user)
    return { ...user }
  }

  async getUser(userId: string): Promise<UserRecord | undefined> {
    const user = this.users.get(userId)
    return user ? { ...user } : undefined
  }

  async setActiveFunnel(userId: string, funnel: FunnelType): Promise<void> {
    const user = this.users.get(userId)
    if (user) user.activeFunnel = funnel
  }

  async updateReminderSettings(userId: string, settings: ReminderSettings): Promise<void> {
    const user = this.users.get(userId)
    if (!user) return
    if (settings.frequency !== undefined) user.reminderFrequency = settings.frequency
    if (settings.timezone !== undefined) user.reminderTimezone = settings.timezone
    if (settings.time !== undefined) user.reminderTime = settings.time
  }

  async listReminderUsers(): Promise<UserRecord[]> {
    return [...this.users.values()]
      .filter(user => user.reminderFrequency !== 'off')
      .map(user => ({ ...user }))
  }

  async listChannels(userId: string): Promise<ChannelRecord[]> {
    return (this.channelsByUser.get(userId) ?? []).map(channel => ({ ...channel }))
  }

  async addChannel(userId: string, name: string): Promise<boolean> {
    const channels = this.channelsByUser.get(userId) ?? []
    if (channels.some(channel => channel.name === name)) return false
    channels.push({ id: String(this.nextChannelId++), name })
    this.channelsByUser.set(userId, channels)
    return true
  }

  async removeChannel(userId: string, channelId: string, policy: ChannelDeletePolicy): Promise<ChannelRemoval> {
    const channels = this.channelsByUser.get(userId) ?? []
    const target = channels.find(channel => channel.id === channelId)
    if (!target) return { channel: null, deletedWeekRows: 0 }
    this.channelsByUser.set(userId, channels.filter(channel => channel !== target))

    let deletedWeekRows = 0
    if (policy === 'cascade') {
      for (const [id, row] of this.weekData) {
        if (row.userId === userId && row.channel === target.name) {
          this.weekData.delete(id)
          deletedWeekRows++
        }
      }
    }
    return { channel: target.name, deletedWeekRows }
  }

  async addWeekData(key: WeekKey, funnelType: FunnelType, counts: StageCounts): Promise<WeekDataChange> {
    const id = weekKeyId(key)
    const existing = this.weekData.get(id)
    if (existing && existing.funnelType !== funnelType) {
      throw new WeekFunnelMismatchError(key, existing.funnelType, funnelType)
    }
    const previous = existing ? { ...existing.counts } : emptyCounts()
    const current = addCounts(previous, counts)
    const now = new Date()
    this.weekData.set(id, {
      ...key,
      funnelType,
      counts: current,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    })
    return { previous, current: { ...current }, funnelType }
  }

  async setWeekCount(key: WeekKey, slot: CountSlot, value: number): Promise<WeekDataChange | null> {
    const existing = this.weekData.get(weekKeyId(key))
    if (!existing) return null
    const previous = { ...existing.counts }
    existing.counts = { ...existing.counts, [slot]: value }
    existing.updatedAt = new Date()
    return { previous, current: { ...existing.counts }, funnelType: existing.funnelType }
  }

  async getWeekData(key: WeekKey): Promise<WeekDataRow | undefined> {
    const row = this.weekData.get(weekKeyId(key))
    return row ? { ...row, counts: { ...row.counts } } : undefined
  }

  async listWeekData(userId: string): Promise<WeekDataRow[]> {
    return [...this.weekData.values()]
      .filter(row => row.userId === userId)
      .map(row => ({ ...row, counts: { ...row.counts } }))
      .sort(compareWeekRows)
  }

  async saveProfile(userId: string, profile: Profile, options: SaveProfileOptions = {}): Promise<void> {
    const now = new Date()
    const existing = this.profiles.get(userId)
    this.profiles.set(userId, { ...profile, userId, createdAt: existing?.createdAt ?? now, updatedAt: now })
    await this.ensureUser(userId)
    if (options.seedActiveFunnel) await this.setActiveFunnel(userId, profile.preferredFunnel)
  }

  async getProfile(userId: string): Promise<StoredProfile | undefined> {
    const profile = this.profiles.get(userId)
    return profile ? { ...profile } : undefined
  }

  async deleteProfile(userId: string): Promise<boolean> {
    return this.profiles.delete(userId)
  }

  async saveReflections(records: NewReflectionRecord[]): Promise<ReflectionRecord[]> {
    const now = new Date()
    const saved = records.map(record => ({ ...record, id: randomUUID(), createdAt: now }))
    this.reflections.push(...saved)
    return saved
  }

  async listReflections(userId: string, limit = 10): Promise<ReflectionRecord[]> {
    return this.reflections
      .filter(record => record.userId === userId)
      .slice()
      .reverse()
      .slice(0, limit)
  }
}
