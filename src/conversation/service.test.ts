import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConversationService, FORM_DISCARDED, SAVE_FAILURE } from './service.js'
import type { BotReply } from './service.js'
import { InMemoryFunnelStore } from '../store/memory-store.js'
import type { StageCounts } from '../funnel/model.js'
import type { WeekDataChange, WeekKey } from '../store/types.js'
import type { FunnelType } from '../funnel/model.js'
import type { Profile } from '../types/schemas.js'

// ─── Helpers ──────────────────────────────────────────────────────────────────

const NOW = new Date('2025-01-08T12:00:00Z') // Wednesday; week of 2025-01-06

const THIS_WEEK = { userId: 'u1', weekStart: '2025-01-06', channel: 'LinkedIn' }

const PROFILE: Profile = {
    role: 'Backend engineer',
    currentLocation: 'Berlin',
    targetLocation: 'Amsterdam',
    level: 'senior',
    deadlineWeeks: 12,
    targetEndDate: '2025-03-31',
    preferredFunnel: 'active',
}

function counts(stage1: number, stage2: number): StageCounts {
    return { stage1, stage2, stage3: 0, stage4: 0, stage5: 0, rejections: 0 }
}

/** Fails the first `failures` week writes, then behaves normally. */
class FlakyStore extends InMemoryFunnelStore {
    failures = 1

    async addWeekData(key: WeekKey, funnelType: FunnelType, counts: StageCounts): Promise<WeekDataChange> {
        if (this.failures > 0) {
            this.failures--
            throw new Error('connection reset')
        }
        return super.addWeekData(key, funnelType, counts)
    }
}

function setup(store: InMemoryFunnelStore = new InMemoryFunnelStore(), policy: 'orphan' | 'cascade' = 'orphan') {
    const service = new ConversationService({ store, clock: () => NOW, channelDeletePolicy: policy })
    const action = (value: string) => service.handle({ userId: 'u1', kind: 'action', action: value })
    const say = (text: string) => service.handle({ userId: 'u1', kind: 'text', text })
    return { store, service, action, say }
}

type Harness = ReturnType<typeof setup>

/** Channel #0, this week, six counts typed in order, then Save. */
async function submitWeek(h: Harness, counts: number[]): Promise<BotReply[]> {
    await h.action('week')
    await h.action('wiz:pick:#0')
    await h.action('wiz:pick:this')
    for (const value of counts) await h.say(String(value))
    return h.action('wiz:save')
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('ConversationService', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    describe('menu & commands', () => {
        it('greets new users and shows the menu', async () => {
            const h = setup()
            const replies = await h.say('/start')
            expect(replies).toHaveLength(2)
            expect(replies[1].text).toBe('Main menu · Active funnel')
            expect(replies[1].choices?.map(choice => choice.action)).toEqual([
                'week', 'history', 'summary', 'export', 'channels', 'funnel:passive', 'reminders', 'profile',
            ])
        })

        it('answers unknown commands', async () => {
            const h = setup()
            expect((await h.say('/foo'))[0].text).toBe('Unknown command /foo. Try /help.')
        })

        it('switches the active funnel', async () => {
            const h = setup()
            const replies = await h.action('funnel:passive')
            expect(replies[0].text).toBe('Switched to the Passive funnel.')
            expect((await h.store.getUser('u1'))?.activeFunnel).toBe('passive')
        })
    })

    describe('channels', () => {
        it('asks for a channel before weekly data', async () => {
            const h = setup()
            const [reply] = await h.action('week')
            expect(reply.text).toBe('Add at least one channel first (e.g. LinkedIn, referrals, job boards).')
        })

        it('processes one user’s events in arrival order', async () => {
            const h = setup()
            const [, added] = await Promise.all([h.action('channels:add'), h.say('LinkedIn')])
            expect(added[0].text).toBe('✅ Channel "LinkedIn" added.')
            expect(await h.store.listChannels('u1')).toEqual([{ id: '1', name: 'LinkedIn' }])
        })

        it('keeps history when removing a channel under the orphan policy', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await submitWeek(h, [3, 0, 0, 0, 0, 0])

            const [reply] = await h.action('channels:remove:1')
            expect(reply.text).toBe('Removed "LinkedIn". Its history stays in reports and exports.')
            expect(await h.store.listWeekData('u1')).toHaveLength(1)
        })

        it('reports deleted rows under the cascade policy', async () => {
            const h = setup(new InMemoryFunnelStore(), 'cascade')
            await h.store.addChannel('u1', 'LinkedIn')
            await submitWeek(h, [3, 0, 0, 0, 0, 0])

            const [reply] = await h.action('channels:remove:1')
            expect(reply.text).toBe('Removed "LinkedIn" and 1 week row(s) of its data.')
        })

        it('puts channel ids on the remove buttons', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await h.store.addChannel('u1', 'Referrals')

            const [reply] = await h.action('channels')

            expect(reply.choices?.slice(0, 2)).toEqual([
                { label: '🗑 LinkedIn', action: 'channels:remove:1' },
                { label: '🗑 Referrals', action: 'channels:remove:2' },
            ])
        })

        it('does not remove another channel when an old button is tapped again', async () => {
            const h = setup(new InMemoryFunnelStore(), 'cascade')
            await h.store.addChannel('u1', 'LinkedIn')
            await h.store.addChannel('u1', 'Referrals')
            await h.store.addWeekData({ ...THIS_WEEK, channel: 'Referrals' }, 'active', counts(4, 1))

            await h.action('channels:remove:1')
            const [again] = await h.action('channels:remove:1')

            expect(again.text).toBe('That channel was already removed.')
            expect(await h.store.listChannels('u1')).toEqual([{ id: '2', name: 'Referrals' }])
            expect(await h.store.listWeekData('u1')).toHaveLength(1)
        })
    })

    describe('weekly data', () => {
        it('saves the week, shows CVR and offers a reflection for grown stages', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')

            const replies = await submitWeek(h, [5, 2, 1, 0, 0, 0])

            expect(replies[0].text).toBe([
                '✅ Saved. LinkedIn, week of 2025-01-06:',
                '',
                'Applications: 5',
                'Responses: 2',
                'Screenings: 1',
                'Onsites: 0',
                'Offers: 0',
                'Rejections: 0',
                '',
                'CVR1 40% · CVR2 50% · CVR3 0% · CVR4 —',
            ].join('\n'))
            expect(replies[1].text).toBe('You moved forward: Responses +2, Screenings +1.\nWant to reflect on it? It takes a minute.')
            expect(h.service.sessionKind('u1')).toBe('reflection_offer')
        })

        it('goes back to the menu when only applications grew', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')

            const replies = await submitWeek(h, [3, 0, 0, 0, 0, 0])

            expect(replies[1].text).toBe('Main menu · Active funnel')
            expect(h.service.sessionKind('u1')).toBeUndefined()
        })

        it('keeps the form when the save fails so it can be retried', async () => {
            const h = setup(new FlakyStore())
            await h.store.addChannel('u1', 'LinkedIn')

            const failed = await submitWeek(h, [3, 0, 0, 0, 0, 0])
            expect(failed[0].text).toBe(SAVE_FAILURE)
            expect(failed[0].choices?.[0].action).toBe('wiz:save')
            expect(h.service.sessionKind('u1')).toBe('week')
            expect(console.error).toHaveBeenCalled()

            const retried = await h.action('wiz:save')
            expect(retried[0].text.startsWith('✅ Saved. LinkedIn')).toBe(true)
            expect((await h.store.listWeekData('u1'))[0].counts.stage1).toBe(3)
        })

        it('stores a full reflection with one entry per grown stage', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await submitWeek(h, [5, 2, 1, 0, 0, 0])

            const [prompt] = await h.action('reflect:yes')
            expect(prompt.text).toBe('📝 Responses +2 · LinkedIn · week of 2025-01-06\nHow did it go overall? (1 = poorly, 5 = great)')

            for (const step of ['wiz:pick:4', 'wiz:skip', 'wiz:skip', 'wiz:pick:3', 'wiz:pick:5', 'wiz:skip', 'wiz:skip', 'wiz:pick:4']) {
                await h.action(step)
            }
            const [saved] = await h.action('wiz:save')

            expect(saved.text).toBe('✅ Reflection saved. Thanks for taking the time!')
            const stored = await h.store.listReflections('u1')
            expect(stored.map(record => [record.stage, record.eventsCount])).toEqual([
                ['screenings', 1],
                ['responses', 2],
            ])
        })

        it('refuses to add to a week stored under the other funnel', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await h.store.addWeekData(THIS_WEEK, 'passive', counts(100, 4))

            await h.action('week')
            await h.action('wiz:pick:#0')
            const [reply] = await h.action('wiz:pick:this')

            expect(reply.text).toBe([
                '⚠️ LinkedIn already has Passive funnel numbers for the week of 2025-01-06. Switch funnels from the menu to add to them, or pick another week.',
                '',
                'Which week? Tap a button or send any date as YYYY-MM-DD.',
            ].join('\n'))
            const [last] = await h.action('wiz:pick:last')
            expect(last.text).toBe('LinkedIn · week of 2024-12-30\nHow many applications did you send? (Skip = 0)')
        })

        it('drops the form when the row changed funnel after the form started', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => {})
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await h.action('week')
            await h.action('wiz:pick:#0')
            await h.action('wiz:pick:this')
            await h.store.addWeekData(THIS_WEEK, 'passive', counts(100, 4))
            for (const value of [10, 1, 0, 0, 0, 0]) await h.say(String(value))

            const replies = await h.action('wiz:save')

            expect(replies[0].text).toBe('Nothing was saved: LinkedIn already has Passive funnel numbers for the week of 2025-01-06.')
            expect(replies[1].text).toBe('Main menu · Active funnel')
            expect(h.service.sessionKind('u1')).toBeUndefined()
            expect((await h.store.getWeekData(THIS_WEEK))?.counts).toEqual(counts(100, 4))
        })

        it('picks "this week" from the user’s timezone', async () => {
            const store = new InMemoryFunnelStore()
            // Sunday 22:30 UTC is Monday morning in Sydney.
            const service = new ConversationService({ store, clock: () => new Date('2025-01-05T22:30:00Z') })
            const act = (action: string) => service.handle({ userId: 'u1', kind: 'action', action })
            await store.ensureUser('u1')
            await store.addChannel('u1', 'LinkedIn')
            await store.updateReminderSettings('u1', { timezone: 'Australia/Sydney' })

            await act('week')
            await act('wiz:pick:#0')
            const [reply] = await act('wiz:pick:this')

            expect(reply.text.split('\n')[0]).toBe('LinkedIn · week of 2025-01-06')
        })

        it('corrects a single count with /edit', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await submitWeek(h, [5, 2, 1, 0, 0, 0])
            await h.action('reflect:no')

            const replies = await h.say('/edit 2025-01-06 linkedin responses 4')

            expect(replies[0].text.split('\n')[0]).toBe('✏️ Updated. LinkedIn, week of 2025-01-06:')
            expect(replies[1].text).toBe('You moved forward: Responses +2.\nWant to reflect on it? It takes a minute.')
            expect((await h.store.listWeekData('u1'))[0].counts.stage2).toBe(4)
        })
    })

    describe('profile', () => {
        it('keeps a menu-chosen funnel when another profile field is edited', async () => {
            const h = setup()
            await h.store.saveProfile('u1', PROFILE, { seedActiveFunnel: true })
            await h.action('funnel:passive')

            await h.action('profile:edit:role')
            await h.say('Staff engineer')
            const [saved] = await h.action('wiz:save')

            expect(saved.text.split('\n')[0]).toBe('✅ Role updated.')
            expect((await h.store.getProfile('u1'))?.role).toBe('Staff engineer')
            expect((await h.store.getUser('u1'))?.activeFunnel).toBe('passive')
        })

        it('switches the active funnel when the preferred funnel is edited', async () => {
            const h = setup()
            await h.store.saveProfile('u1', PROFILE, { seedActiveFunnel: true })

            await h.action('profile:edit:preferredFunnel')
            await h.action('wiz:pick:passive')
            await h.action('wiz:save')

            expect((await h.store.getUser('u1'))?.activeFunnel).toBe('passive')
        })


        it('saves nothing when the wizard is cancelled', async () => {
            const h = setup()
            await h.action('profile:create')
            await h.say('Product Manager')
            await h.say('Berlin')

            const replies = await h.say('/cancel')

            expect(replies[0].text).toBe('Cancelled. Nothing was saved.')
            expect(await h.store.getProfile('u1')).toBeUndefined()
            expect(h.service.sessionKind('u1')).toBeUndefined()
        })

        it('tells the user when a new form replaces an unfinished one', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await h.action('profile:create')

            const replies = await h.action('week')

            expect(replies[0].text).toBe('The previous unfinished form was discarded.')
            expect(h.service.sessionKind('u1')).toBe('week')
        })
    })

    describe('corrections during a form', () => {
        it('says so when /edit replaces an unfinished form with a reflection offer', async () => {
            const h = setup()
            await h.store.addChannel('u1', 'LinkedIn')
            await submitWeek(h, [5, 2, 1, 0, 0, 0])
            await h.action('reflect:no')
            await h.action('profile:create')

            const replies = await h.say('/edit 2025-01-06 LinkedIn responses 4')

            expect(replies[0].text).toBe(FORM_DISCARDED)
            expect(replies[1].text.split('\n')[0]).toBe('✏️ Updated. LinkedIn, week of 2025-01-06:')
            expect(h.service.sessionKind('u1')).toBe('reflection_offer')
        })
    })

    describe('export', () => {
        it('sends a header-only template when there is no data', async () => {
            const h = setup()
            const [reply] = await h.action('export')
            expect(reply.document?.filename).toBe('funnel-active-2025-01-08.csv')
            expect(reply.document?.caption).toBe('No data yet; here is an empty template.')
            expect(reply.document?.content.split('\r\n')).toHaveLength(2)
        })

        it('includes rows from both funnels', async () => {
            const h = setup()
            await h.store.addWeekData(THIS_WEEK, 'active', counts(5, 2))
            await h.store.addWeekData({ ...THIS_WEEK, weekStart: '2024-12-30' }, 'passive', counts(40, 2))

            const [reply] = await h.action('export')

            expect(reply.document?.caption).toBe('Funnel data: 2 row(s).')
            expect(reply.document?.content.split('\r\n').slice(1)).toEqual([
                '2025-01-06;LinkedIn;Active;5;2;0;0;0;0;40%;0%;—;—',
                '2024-12-30;LinkedIn;Passive;40;2;0;0;0;0;5%;0%;—;—',
                '',
            ])
        })
    })
})
