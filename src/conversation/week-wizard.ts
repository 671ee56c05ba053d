import { COUNT_SLOTS, emptyCounts, funnelTitle, otherFunnel, slotLabel } from '../funnel/model.js'
import type { CountSlot, FunnelType, StageCounts } from '../funnel/model.js'
import { normalizeWeekStart, previousWeekStart, weekStartIn } from '../funnel/week.js'
import { parseCount } from './validators.js'
import type { WizardDefinition, WizardStep } from './wizard.js'

export interface WeekDraft {
    channel?: string
    weekStart?: string
    counts: Partial<StageCounts>
}

export interface WeekContext {
    funnel: FunnelType
    channels: string[]
    /** IANA zone that decides which week "this week" is. */
    timezone: string
    /** Week rows already stored under the other funnel; those can't be added to. */
    otherFunnelRows: { weekStart: string; channel: string }[]
}

export interface WeekSubmission {
    channel: string
    weekStart: string
    counts: StageCounts
}

const THIS_WEEK = 'this'
const LAST_WEEK = 'last'

const COUNT_QUESTIONS: Record<FunnelType, Record<CountSlot, string>> = {
    active: {
        stage1: 'How many applications did you send?',
        stage2: 'How many responses did you get?',
        stage3: 'How many screening calls?',
        stage4: 'How many onsite / final interviews?',
        stage5: 'How many offers?',
        rejections: 'How many rejections?',
    },
    passive: {
        stage1: 'How many profile views?',
        stage2: 'How many incoming messages from recruiters?',
        stage3: 'How many screening calls?',
        stage4: 'How many onsite / final interviews?',
        stage5: 'How many offers?',
        rejections: 'How many rejections?',
    },
}

function withCount(counts: Partial<StageCounts>, slot: CountSlot, value: number): Partial<StageCounts> {
    const next = { ...counts }
    next[slot] = value
    return next
}

function withoutCount(counts: Partial<StageCounts>, slot: CountSlot): Partial<StageCounts> {
    const next = { ...counts }
    delete next[slot]
    return next
}

function countStep(ctx: WeekContext, slot: CountSlot): WizardStep<WeekDraft> {
    return {
        id: slot,
        optional: true,
        prompt: draft => `${draft.channel ?? ''} · week of ${draft.weekStart ?? ''}\n${COUNT_QUESTIONS[ctx.funnel][slot]} (Skip = 0)`,
        accept: (draft, input) => {
            const parsed = parseCount(input)
            if (!parsed.ok) return parsed
            return { ok: true, draft: { ...draft, counts: withCount(draft.counts, slot, parsed.value) } }
        },
        clear: draft => ({ ...draft, counts: withoutCount(draft.counts, slot) }),
    }
}

export function resolveChannel(channels: string[], input: string): string | undefined {
    const text = input.trim()
    const indexed = /^#(\d+)$/.exec(text)
    if (indexed) return channels[Number(indexed[1])]
    const wanted = text.toLowerCase()
    return channels.find(name => name.toLowerCase() === wanted)
}

function channelStep(ctx: WeekContext): WizardStep<WeekDraft> {
    return {
        id: 'channel',
        prompt: () => 'Which channel is this data for?',
        // Buttons carry the list index; Telegram caps callback data at 64 bytes.
        options: () => ctx.channels.map((name, i) => ({ label: name, action: `#${i}` })),
        accept: (draft, input) => {
            const channel = resolveChannel(ctx.channels, input)
            if (!channel) return { ok: false, error: 'Pick one of your channels from the buttons.' }
            return { ok: true, draft: { ...draft, channel } }
        },
        clear: draft => ({ ...draft, channel: undefined }),
    }
}

function weekStep(ctx: WeekContext): WizardStep<WeekDraft> {
    return {
        id: 'week',
        prompt: () => 'Which week? Tap a button or send any date as YYYY-MM-DD.',
        options: () => [
            { label: 'This week', action: THIS_WEEK },
            { label: 'Last week', action: LAST_WEEK },
        ],
        accept: (draft, input, now) => {
            const value = input.trim().toLowerCase()
            const current = weekStartIn(now, ctx.timezone)
            let weekStart: string | null
            if (value === THIS_WEEK) weekStart = current
            else if (value === LAST_WEEK) weekStart = previousWeekStart(current)
            else weekStart = normalizeWeekStart(value)

            if (!weekStart) return { ok: false, error: 'Send the date as YYYY-MM-DD, e.g. 2025-01-06.' }
            if (weekStart > current) return { ok: false, error: 'That week hasn’t started yet.' }
            const taken = ctx.otherFunnelRows.some(row => row.weekStart === weekStart && row.channel === draft.channel)
            if (taken) {
                return {
                    ok: false,
                    error: `${draft.channel ?? 'This channel'} already has ${funnelTitle(otherFunnel(ctx.funnel))} funnel numbers for the week of ${weekStart}. Switch funnels from the menu to add to them, or pick another week.`,
                }
            }
            return { ok: true, draft: { ...draft, weekStart } }
        },
        clear: draft => ({ ...draft, weekStart: undefined }),
    }
}

export function fillCounts(partial: Partial<StageCounts>): StageCounts {
    return { ...emptyCounts(), ...partial }
}

export function formatCountsBlock(funnel: FunnelType, counts: StageCounts): string {
    return COUNT_SLOTS.map(slot => `${slotLabel(funnel, slot)}: ${counts[slot]}`).join('\n')
}

export function weekWizard(ctx: WeekContext): WizardDefinition<WeekDraft, WeekSubmission> {
    return {
        title: `${funnelTitle(ctx.funnel)} funnel data`,
        steps: [channelStep(ctx), weekStep(ctx), ...COUNT_SLOTS.map(slot => countStep(ctx, slot))],
        review: draft => [
            `${funnelTitle(ctx.funnel)} funnel · ${draft.channel ?? '?'} · week of ${draft.weekStart ?? '?'}`,
            '',
            formatCountsBlock(ctx.funnel, fillCounts(draft.counts)),
            '',
            'Numbers are added to anything already saved for this week and channel. Save?',
        ].join('\n'),
        finalize: draft => {
            if (!draft.channel || !draft.weekStart) {
                return { ok: false, error: 'Channel and week are required.' }
            }
            return {
                ok: true,
                value: { channel: draft.channel, weekStart: draft.weekStart, counts: fillCounts(draft.counts) },
            }
        },
    }
}

export function emptyWeekDraft(): WeekDraft {
    return { counts: {} }
}
