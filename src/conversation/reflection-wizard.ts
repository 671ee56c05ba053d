/**
 * Reflection Wizard
 *
 * One form covering every stage that grew in a submission. Each qualifying
 * stage becomes a section; rejections get a reasons section instead of a
 * rating. A single save yields one entry per section.
 */

import { isRejectionStage } from '../funnel/reflection-trigger.js'
import type { QualifyingIncrease, QualifyingStage } from '../funnel/reflection-trigger.js'
import type { FunnelType } from '../funnel/model.js'
import {
    REJECTION_POINTS,
    REJECTION_REASONS,
    ReflectionAnswersSchema,
} from '../types/schemas.js'
import type { ReflectionAnswers, RejectionPoint, RejectionReason } from '../types/schemas.js'
import { parseIntInRange, parseText } from './validators.js'
import type { StepOutcome, WizardDefinition, WizardStep } from './wizard.js'

export interface ReflectionContext {
    weekStart: string
    channel: string
    funnel: FunnelType
    increases: QualifyingIncrease[]
}

export interface SectionDraft {
    rating?: number
    strengths?: string
    weaknesses?: string
    mood?: number
    rejectAfter?: RejectionPoint
    reasons?: RejectionReason[]
    reasonOther?: string
}

export interface ReflectionDraft {
    sections: SectionDraft[]
}

export interface ReflectionEntry {
    stage: QualifyingStage
    eventsCount: number
    answers: ReflectionAnswers
}

export const REJECTION_POINT_LABELS: Record<RejectionPoint, string> = {
    no_interview: 'Without an interview',
    after_recruiter: 'After the recruiter call',
    after_technical: 'After a technical / onsite round',
}

export const REJECTION_REASON_LABELS: Record<RejectionReason, string> = {
    skill: 'Skills gap',
    culture: 'Culture fit',
    location: 'Location',
    language: 'Language',
    salary: 'Salary / budget',
    domain: 'Domain experience',
    timing: 'Timing / position closed',
    other: 'Other',
}

const DONE = 'done'

// ─── Draft Helpers ──────────────────────────────────────────────────────────

function section(draft: ReflectionDraft, index: number): SectionDraft {
    return draft.sections[index] ?? {}
}

function patchSection(draft: ReflectionDraft, index: number, patch: SectionDraft): ReflectionDraft {
    const sections = [...draft.sections]
    sections[index] = { ...section(draft, index), ...patch }
    return { sections }
}

function clearSection(draft: ReflectionDraft, index: number, key: keyof SectionDraft): ReflectionDraft {
    const sections = [...draft.sections]
    const next = { ...section(draft, index) }
    delete next[key]
    sections[index] = next
    return { sections }
}

function scale(): { label: string; action: string }[] {
    return [1, 2, 3, 4, 5].map(n => ({ label: String(n), action: String(n) }))
}

function ratingOutcome(draft: ReflectionDraft, index: number, key: 'rating' | 'mood', input: string): StepOutcome<ReflectionDraft> {
    const parsed = parseIntInRange(input, 1, 5)
    if (!parsed.ok) return parsed
    const patch: SectionDraft = key === 'rating' ? { rating: parsed.value } : { mood: parsed.value }
    return { ok: true, draft: patchSection(draft, index, patch) }
}

// ─── Section Steps ──────────────────────────────────────────────────────────

function header(ctx: ReflectionContext, increase: QualifyingIncrease): string {
    return `📝 ${increase.label} +${increase.delta} · ${ctx.channel} · week of ${ctx.weekStart}`
}

function stageSteps(ctx: ReflectionContext, increase: QualifyingIncrease, index: number): WizardStep<ReflectionDraft>[] {
    const head = header(ctx, increase)
    return [
        {
            id: `s${index}.rating`,
            prompt: () => `${head}\nHow did it go overall? (1 = poorly, 5 = great)`,
            options: scale,
            accept: (draft, input) => ratingOutcome(draft, index, 'rating', input),
            clear: draft => clearSection(draft, index, 'rating'),
        },
        {
            id: `s${index}.strengths`,
            optional: true,
            prompt: () => `${head}\nWhat went well?`,
            accept: (draft, input) => {
                const parsed = parseText(input, 1000)
                return parsed.ok ? { ok: true, draft: patchSection(draft, index, { strengths: parsed.value }) } : parsed
            },
            clear: draft => clearSection(draft, index, 'strengths'),
        },
        {
            id: `s${index}.weaknesses`,
            optional: true,
            prompt: () => `${head}\nWhat would you improve next time?`,
            accept: (draft, input) => {
                const parsed = parseText(input, 1000)
                return parsed.ok ? { ok: true, draft: patchSection(draft, index, { weaknesses: parsed.value }) } : parsed
            },
            clear: draft => clearSection(draft, index, 'weaknesses'),
        },
        moodStep(head, index),
    ]
}

function rejectionSteps(ctx: ReflectionContext, increase: QualifyingIncrease, index: number): WizardStep<ReflectionDraft>[] {
    const head = header(ctx, increase)
    return [
        {
            id: `s${index}.rejectAfter`,
            prompt: () => `${head}\nAt which point were you rejected?`,
            options: () => REJECTION_POINTS.map(point => ({ label: REJECTION_POINT_LABELS[point], action: point })),
            accept: (draft, input) => {
                const point = REJECTION_POINTS.find(candidate => candidate === input.trim())
                if (!point) return { ok: false, error: 'Choose one of the options.' }
                return { ok: true, draft: patchSection(draft, index, { rejectAfter: point }) }
            },
            clear: draft => clearSection(draft, index, 'rejectAfter'),
        },
        {
            id: `s${index}.reasons`,
            prompt: draft => {
                const picked = section(draft, index).reasons ?? []
                const list = picked.length > 0 ? picked.map(r => REJECTION_REASON_LABELS[r]).join(', ') : 'none'
                return `${head}\nWhat were the likely reasons? Tap to toggle, then Done.\nSelected: ${list}`
            },
            options: draft => {
                const picked = section(draft, index).reasons ?? []
                return [
                    ...REJECTION_REASONS.map(reason => ({
                        label: `${picked.includes(reason) ? '☑️' : '⬜'} ${REJECTION_REASON_LABELS[reason]}`,
                        action: reason,
                    })),
                    { label: 'Done', action: DONE },
                ]
            },
            accept: (draft, input) => {
                const value = input.trim().toLowerCase()
                const picked = section(draft, index).reasons ?? []
                if (value === DONE) {
                    if (picked.length === 0) return { ok: false, error: 'Select at least one reason, then Done.' }
                    return { ok: true, draft }
                }
                const reason = REJECTION_REASONS.find(candidate => candidate === value)
                if (!reason) return { ok: false, error: 'Tap the reasons that apply, then Done.' }
                const reasons = picked.includes(reason) ? picked.filter(r => r !== reason) : [...picked, reason]
                return { ok: true, stay: true, draft: patchSection(draft, index, { reasons }) }
            },
            clear: draft => clearSection(draft, index, 'reasons'),
        },
        {
            id: `s${index}.reasonOther`,
            when: draft => (section(draft, index).reasons ?? []).includes('other'),
            prompt: () => `${head}\nDescribe the other reason.`,
            accept: (draft, input) => {
                const parsed = parseText(input, 500)
                return parsed.ok ? { ok: true, draft: patchSection(draft, index, { reasonOther: parsed.value }) } : parsed
            },
            clear: draft => clearSection(draft, index, 'reasonOther'),
        },
        moodStep(head, index),
    ]
}

function moodStep(head: string, index: number): WizardStep<ReflectionDraft> {
    return {
        id: `s${index}.mood`,
        prompt: () => `${head}\nHow do you feel about it? (1 = drained, 5 = energized)`,
        options: scale,
        accept: (draft, input) => ratingOutcome(draft, index, 'mood', input),
        clear: draft => clearSection(draft, index, 'mood'),
    }
}

// ─── Finalize ───────────────────────────────────────────────────────────────

function toAnswers(stage: QualifyingStage, draft: SectionDraft): unknown {
    if (isRejectionStage(stage)) {
        const reasons = draft.reasons ?? []
        return {
            kind: 'rejection',
            rejectAfter: draft.rejectAfter,
            reasons,
            reasonOther: reasons.includes('other') ? draft.reasonOther : undefined,
            mood: draft.mood,
        }
    }
    return {
        kind: 'stage',
        rating: draft.rating,
        strengths: draft.strengths,
        weaknesses: draft.weaknesses,
        mood: draft.mood,
    }
}

function formatSection(increase: QualifyingIncrease, draft: SectionDraft): string {
    const lines = [`${increase.label} +${increase.delta}`]
    if (isRejectionStage(increase.stage)) {
        if (draft.rejectAfter) lines.push(`  Rejected: ${REJECTION_POINT_LABELS[draft.rejectAfter]}`)
        if (draft.reasons?.length) lines.push(`  Reasons: ${draft.reasons.map(r => REJECTION_REASON_LABELS[r]).join(', ')}`)
        if (draft.reasonOther && draft.reasons?.includes('other')) lines.push(`  Other: ${draft.reasonOther}`)
    } else {
        if (draft.rating !== undefined) lines.push(`  Rating: ${draft.rating}/5`)
        if (draft.strengths) lines.push(`  Went well: ${draft.strengths}`)
        if (draft.weaknesses) lines.push(`  To improve: ${draft.weaknesses}`)
    }
    if (draft.mood !== undefined) lines.push(`  Mood: ${draft.mood}/5`)
    return lines.join('\n')
}

export function reflectionWizard(ctx: ReflectionContext): WizardDefinition<ReflectionDraft, ReflectionEntry[]> {
    const steps = ctx.increases.flatMap((increase, index) =>
        isRejectionStage(increase.stage)
            ? rejectionSteps(ctx, increase, index)
            : stageSteps(ctx, increase, index))

    return {
        title: 'Reflection',
        steps,
        review: draft => [
            `Reflection · ${ctx.channel} · week of ${ctx.weekStart}`,
            '',
            ...ctx.increases.map((increase, i) => formatSection(increase, section(draft, i))),
            '',
            'Save this reflection?',
        ].join('\n'),
        finalize: draft => {
            const entries: ReflectionEntry[] = []
            for (const [i, increase] of ctx.increases.entries()) {
                const parsed = ReflectionAnswersSchema.safeParse(toAnswers(increase.stage, section(draft, i)))
                if (!parsed.success) {
                    return { ok: false, error: `The ${increase.label.toLowerCase()} section is incomplete.` }
                }
                entries.push({ stage: increase.stage, eventsCount: increase.delta, answers: parsed.data })
            }
            return { ok: true, value: entries }
        },
    }
}

export function emptyReflectionDraft(ctx: ReflectionContext): ReflectionDraft {
    return { sections: ctx.increases.map(() => ({})) }
}
