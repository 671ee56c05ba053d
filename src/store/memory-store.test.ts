import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryFunnelStore } from './memory-store.js'
import { WeekFunnelMismatchError } from './types.js'
import type { Profile } from '../types/schemas.js'

const KEY = { userId: 'u1', weekStart: '2025-01-06', channel: 'LinkedIn' }

const PROFILE: Profile = {
  role: 'Backend engineer',
  currentLocation: 'Berlin',
  targetLocation: 'Amsterdam',
  level: 'senior',
  deadlineWeeks: 12,
  targetEndDate: '2025-03-31',
  preferredFunnel: 'passive',
}

describe('InMemoryFunnelStore', () => {
  let store: InMemoryFunnelStore

  beforeEach(async () => {
    store = new InMemoryFunnelStore()
    await store.ensureUser('u1', 'alex')
  })

  it('creates users on the active funnel with reminders off', async () => {
    const user = await store.getUser('u1')
    expect(user?.activeFunnel).toBe('active')
    expect(user?.reminderFrequency).toBe('off')
    expect(await store.listReminderUsers()).toEqual([])
  })

  it('sums a second submission for the same week and channel into one row', async () => {
    await store.addWeekData(KEY, 'active', { stage1: 5, stage2: 2, stage3: 1, stage4: 0, stage5: 0, rejections: 0 })
    const change = await store.addWeekData(KEY, 'active', { stage1: 3, stage2: 1, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })

    expect(change.previous).toEqual({ stage1: 5, stage2: 2, stage3: 1, stage4: 0, stage5: 0, rejections: 0 })
    expect(change.current).toEqual({ stage1: 8, stage2: 3, stage3: 1, stage4: 0, stage5: 0, rejections: 0 })
    const rows = await store.listWeekData('u1')
    expect(rows).toHaveLength(1)
    expect(rows[0].counts.stage1).toBe(8)
  })

  it('overwrites a single count and returns null for a missing row', async () => {
    await store.addWeekData(KEY, 'active', { stage1: 5, stage2: 2, stage3: 1, stage4: 0, stage5: 0, rejections: 0 })

    const change = await store.setWeekCount(KEY, 'stage2', 3)
    expect(change?.previous.stage2).toBe(2)
    expect(change?.current.stage2).toBe(3)
    expect(await store.setWeekCount({ ...KEY, weekStart: '2024-12-30' }, 'stage2', 1)).toBeNull()
  })

  it('does not let callers mutate stored rows', async () => {
    await store.addWeekData(KEY, 'active', { stage1: 1, stage2: 0, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })
    const row = await store.getWeekData(KEY)
    if (row) row.counts.stage1 = 99
    expect((await store.getWeekData(KEY))?.counts.stage1).toBe(1)
  })

  it('keeps week data when a channel is removed under the orphan policy', async () => {
    await store.addChannel('u1', 'LinkedIn')
    await store.addWeekData(KEY, 'active', { stage1: 1, stage2: 0, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })
    const [channel] = await store.listChannels('u1')

    expect(await store.removeChannel('u1', channel.id, 'orphan')).toEqual({ channel: 'LinkedIn', deletedWeekRows: 0 })
    expect(await store.listChannels('u1')).toEqual([])
    expect(await store.listWeekData('u1')).toHaveLength(1)
  })

  it('deletes week data when a channel is removed under the cascade policy', async () => {
    await store.addChannel('u1', 'LinkedIn')
    await store.addWeekData(KEY, 'active', { stage1: 1, stage2: 0, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })
    const [channel] = await store.listChannels('u1')

    expect(await store.removeChannel('u1', channel.id, 'cascade')).toEqual({ channel: 'LinkedIn', deletedWeekRows: 1 })
    expect(await store.listWeekData('u1')).toEqual([])
  })

  it('rejects duplicate channel names and unknown channel ids', async () => {
    expect(await store.addChannel('u1', 'LinkedIn')).toBe(true)
    expect(await store.addChannel('u1', 'LinkedIn')).toBe(false)
    expect(await store.listChannels('u1')).toEqual([{ id: '1', name: 'LinkedIn' }])
    expect(await store.removeChannel('u1', '99', 'cascade')).toEqual({ channel: null, deletedWeekRows: 0 })
  })

  it('never reuses a removed channel id', async () => {
    await store.addChannel('u1', 'LinkedIn')
    await store.addChannel('u1', 'Referrals')
    await store.removeChannel('u1', '1', 'orphan')
    await store.addChannel('u1', 'LinkedIn')

    expect(await store.listChannels('u1')).toEqual([{ id: '2', name: 'Referrals' }, { id: '3', name: 'LinkedIn' }])
    expect(await store.removeChannel('u1', '1', 'orphan')).toEqual({ channel: null, deletedWeekRows: 0 })
  })

  it('refuses to sum counts from the other funnel into a stored row', async () => {
    await store.addWeekData(KEY, 'passive', { stage1: 100, stage2: 4, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })

    await expect(
      store.addWeekData(KEY, 'active', { stage1: 10, stage2: 1, stage3: 0, stage4: 0, stage5: 0, rejections: 0 }),
    ).rejects.toBeInstanceOf(WeekFunnelMismatchError)
    const row = await store.getWeekData(KEY)
    expect(row?.funnelType).toBe('passive')
    expect(row?.counts.stage1).toBe(100)
  })

  it('seeds the active funnel only when asked', async () => {
    await store.saveProfile('u1', PROFILE, { seedActiveFunnel: true })
    expect((await store.getUser('u1'))?.activeFunnel).toBe('passive')

    await store.setActiveFunnel('u1', 'active')
    await store.saveProfile('u1', { ...PROFILE, role: 'Platform engineer' })
    expect((await store.getUser('u1'))?.activeFunnel).toBe('active')
    expect((await store.getProfile('u1'))?.role).toBe('Platform engineer')
    expect(await store.deleteProfile('u1')).toBe(true)
    expect(await store.getProfile('u1')).toBeUndefined()
  })

  it('isolates data between users', async () => {
    await store.ensureUser('u2')
    await store.addWeekData(KEY, 'active', { stage1: 1, stage2: 0, stage3: 0, stage4: 0, stage5: 0, rejections: 0 })
    expect(await store.listWeekData('u2')).toEqual([])
  })

  it('lists reflections newest first with ids', async () => {
    const saved = await store.saveReflections([
      { ...KEY, funnelType: 'active', stage: 'responses', eventsCount: 1, answers: { kind: 'stage', rating: 4, mood: 3 } },
      { ...KEY, funnelType: 'active', stage: 'rejections', eventsCount: 2, answers: { kind: 'rejection', rejectAfter: 'no_interview', reasons: ['timing'], mood: 2 } },
    ])
    expect(saved.every(record => record.id.length > 0)).toBe(true)
    const listed = await store.listReflections('u1')
    expect(listed.map(record => record.stage)).toEqual(['rejections', 'responses'])
  })
})
