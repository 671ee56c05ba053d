/**
 * Profile Wizard
 *
 * Creation walks the required fields, then the optional ones. Editing reuses
 * the same steps for a single field group, seeded with the stored profile.
 */

import { funnelTitle, isFunnelType } from '../funnel/model.js'
import { addWeeks } from '../funnel/week.js'
import { COMPANY_TYPES, ProfileSchema } from '../types/schemas.js'
import type { Profile } from '../types/schemas.js'
import { formatSalary, parseIntInRange, parseList, parseSalary, parseText, parseUrl } from './validators.js'
import type { Parsed } from './validators.js'
import type { StepOutcome, WizardDefinition, WizardStep } from './wizard.js'

export type ProfileDraft = Partial<Profile> & { levelChoice?: string }

export const LEVELS = ['junior', 'middle', 'senior', 'lead'] as const
const CUSTOM_LEVEL = 'custom'
const DONE = 'done'

const COMPANY_TYPE_LABELS: Record<typeof COMPANY_TYPES[number], string> = {
    smb: 'Small business',
    scaleup: 'Scale-up',
    enterprise: 'Enterprise',
    consulting: 'Consulting / agency',
}

function capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1)
}

function accepted<T>(parsed: Parsed<T>, apply: (value: T) => ProfileDraft): StepOutcome<ProfileDraft> {
    return parsed.ok ? { ok: true, draft: apply(parsed.value) } : parsed
}

function without(draft: ProfileDraft, ...keys: (keyof ProfileDraft)[]): ProfileDraft {
    const next = { ...draft }
    for (const key of keys) delete next[key]
    return next
}

type TextField = 'role' | 'currentLocation' | 'targetLocation' | 'constraints'
type ListField = 'roleSynonyms' | 'industries' | 'competencies' | 'superpowers'

function withValue<K extends TextField | ListField>(draft: ProfileDraft, key: K, value: ProfileDraft[K]): ProfileDraft {
    const next = { ...draft }
    next[key] = value
    return next
}

function textStep(
    id: TextField,
    question: string,
    max: number,
    optional = false,
): WizardStep<ProfileDraft> {
    return {
        id,
        optional,
        prompt: () => question,
        accept: (draft, input) => accepted(parseText(input, max), value => withValue(draft, id, value)),
        clear: draft => without(draft, id),
    }
}

function listStep(
    id: ListField,
    question: string,
    limits: { max: number; min?: number },
): WizardStep<ProfileDraft> {
    return {
        id,
        optional: true,
        prompt: () => question,
        accept: (draft, input) => accepted(parseList(input, limits), value => withValue(draft, id, value)),
        clear: draft => without(draft, id),
    }
}

// ─── Steps ──────────────────────────────────────────────────────────────────

const roleStep = textStep('role', 'What role are you looking for? (e.g. Product Manager)', 100)
const currentLocationStep = textStep('currentLocation', 'Where are you based now? (city, country)', 100)
const targetLocationStep = textStep('targetLocation', 'Where do you want to work? (city, country or “remote”)', 100)

const levelStep: WizardStep<ProfileDraft> = {
    id: 'level',
    prompt: () => 'What is your seniority level?',
    options: () => [
        ...LEVELS.map(level => ({ label: capitalize(level), action: level })),
        { label: 'Other…', action: CUSTOM_LEVEL },
    ],
    accept: (draft, input) => {
        const value = input.trim().toLowerCase()
        if (value === CUSTOM_LEVEL) {
            return { ok: true, draft: { ...without(draft, 'level'), levelChoice: CUSTOM_LEVEL } }
        }
        return accepted(parseText(input, 50), level => ({ ...draft, level, levelChoice: level }))
    },
    clear: draft => without(draft, 'level', 'levelChoice'),
}

const levelCustomStep: WizardStep<ProfileDraft> = {
    id: 'levelCustom',
    when: draft => draft.levelChoice === CUSTOM_LEVEL,
    prompt: () => 'Describe your level in a few words.',
    accept: (draft, input) => accepted(parseText(input, 50), level => ({ ...draft, level })),
    clear: draft => without(draft, 'level'),
}

const deadlineStep: WizardStep<ProfileDraft> = {
    id: 'deadlineWeeks',
    prompt: () => 'In how many weeks do you want an offer? (1–52)',
    accept: (draft, input, now) => accepted(parseIntInRange(input, 1, 52), weeks => ({
        ...draft,
        deadlineWeeks: weeks,
        targetEndDate: addWeeks(now, weeks),
    })),
    clear: draft => without(draft, 'deadlineWeeks', 'targetEndDate'),
}

const funnelStep: WizardStep<ProfileDraft> = {
    id: 'preferredFunnel',
    prompt: () => 'Which funnel do you mainly track?\nActive: you apply. Passive: recruiters come to you.',
    options: () => [
        { label: funnelTitle('active'), action: 'active' },
        { label: funnelTitle('passive'), action: 'passive' },
    ],
    accept: (draft, input) => {
        const value = input.trim().toLowerCase()
        if (!isFunnelType(value)) return { ok: false, error: 'Choose Active or Passive.' }
        return { ok: true, draft: { ...draft, preferredFunnel: value } }
    },
    clear: draft => without(draft, 'preferredFunnel'),
}

const synonymsStep = listStep('roleSynonyms', 'Other titles for the same role? Up to 4, comma separated.', { max: 4 })

const salaryStep: WizardStep<ProfileDraft> = {
    id: 'salary',
    optional: true,
    prompt: () => 'Salary expectations? Format: 3000-5000 EUR/month',
    accept: (draft, input) => accepted(parseSalary(input), salary => ({ ...draft, salary })),
    clear: draft => without(draft, 'salary'),
}

const companyTypesStep: WizardStep<ProfileDraft> = {
    id: 'companyTypes',
    optional: true,
    prompt: draft => {
        const picked = draft.companyTypes ?? []
        return `Which company types fit you? Tap to toggle, then Done.\nSelected: ${picked.length > 0 ? picked.join(', ') : 'none'}`
    },
    options: draft => [
        ...COMPANY_TYPES.map(type => ({
            label: `${(draft.companyTypes ?? []).includes(type) ? '☑️' : '⬜'} ${COMPANY_TYPE_LABELS[type]}`,
            action: type,
        })),
        { label: 'Done', action: DONE },
    ],
    accept: (draft, input) => {
        const value = input.trim().toLowerCase()
        const picked = draft.companyTypes ?? []
        if (value === DONE) {
            return { ok: true, draft: picked.length > 0 ? draft : without(draft, 'companyTypes') }
        }
        const type = COMPANY_TYPES.find(candidate => candidate === value)
        if (!type) return { ok: false, error: 'Tap one of the options, then Done.' }
        const next = picked.includes(type) ? picked.filter(p => p !== type) : [...picked, type]
        return { ok: true, stay: true, draft: { ...draft, companyTypes: next } }
    },
    clear: draft => without(draft, 'companyTypes'),
}

const industriesStep = listStep('industries', 'Preferred industries? Up to 3, comma separated.', { max: 3 })
const competenciesStep = listStep('competencies', 'Key competencies? Up to 10, comma separated.', { max: 10 })
const superpowersStep = listStep(
    'superpowers',
    'Your 3–5 superpowers, as “action → business effect”, comma separated.',
    { min: 3, max: 5 },
)
const constraintsStep = textStep('constraints', 'Any constraints (visa, schedule, relocation)? Up to 500 characters.', 500, true)

const linkedinStep: WizardStep<ProfileDraft> = {
    id: 'linkedinUrl',
    optional: true,
    prompt: () => 'Link to your LinkedIn profile?',
    accept: (draft, input) => accepted(parseUrl(input), linkedinUrl => ({ ...draft, linkedinUrl })),
    clear: draft => without(draft, 'linkedinUrl'),
}

export const PROFILE_STEPS: WizardStep<ProfileDraft>[] = [
    roleStep,
    currentLocationStep,
    targetLocationStep,
    levelStep,
    levelCustomStep,
    deadlineStep,
    funnelStep,
    synonymsStep,
    salaryStep,
    companyTypesStep,
    industriesStep,
    competenciesStep,
    superpowersStep,
    constraintsStep,
    linkedinStep,
]

// ─── Editable Fields ────────────────────────────────────────────────────────

export interface ProfileField {
    field: string
    label: string
    steps: string[]
    /** Optional fields can also be cleared. */
    optional: boolean
}

export const PROFILE_FIELDS: ProfileField[] = [
    { field: 'role', label: 'Role', steps: ['role'], optional: false },
    { field: 'currentLocation', label: 'Current location', steps: ['currentLocation'], optional: false },
    { field: 'targetLocation', label: 'Target location', steps: ['targetLocation'], optional: false },
    { field: 'level', label: 'Level', steps: ['level', 'levelCustom'], optional: false },
    { field: 'deadlineWeeks', label: 'Deadline', steps: ['deadlineWeeks'], optional: false },
    { field: 'preferredFunnel', label: 'Preferred funnel', steps: ['preferredFunnel'], optional: false },
    { field: 'roleSynonyms', label: 'Role synonyms', steps: ['roleSynonyms'], optional: true },
    { field: 'salary', label: 'Salary', steps: ['salary'], optional: true },
    { field: 'companyTypes', label: 'Company types', steps: ['companyTypes'], optional: true },
    { field: 'industries', label: 'Industries', steps: ['industries'], optional: true },
    { field: 'competencies', label: 'Competencies', steps: ['competencies'], optional: true },
    { field: 'superpowers', label: 'Superpowers', steps: ['superpowers'], optional: true },
    { field: 'constraints', label: 'Constraints', steps: ['constraints'], optional: true },
    { field: 'linkedinUrl', label: 'LinkedIn', steps: ['linkedinUrl'], optional: true },
]

export function findProfileField(field: string): ProfileField | undefined {
    return PROFILE_FIELDS.find(entry => entry.field === field)
}

/** Profile with one optional field removed; null for required fields. */
export function clearProfileField(profile: Profile, field: ProfileField): Profile | null {
    if (!field.optional) return null
    const cleared = PROFILE_STEPS
        .filter(step => field.steps.includes(step.id))
        .reduce<ProfileDraft>((draft, step) => step.clear(draft), { ...profile })
    const result = finalizeProfile(cleared)
    return result.ok ? result.value : null
}

// ─── Rendering & Finalize ───────────────────────────────────────────────────

export function formatProfile(profile: ProfileDraft): string {
    const lines: string[] = []
    if (profile.role) lines.push(`Role: ${profile.role}`)
    if (profile.roleSynonyms?.length) lines.push(`Also: ${profile.roleSynonyms.join(', ')}`)
    if (profile.currentLocation) lines.push(`Based in: ${profile.currentLocation}`)
    if (profile.targetLocation) lines.push(`Target: ${profile.targetLocation}`)
    if (profile.level) lines.push(`Level: ${profile.level}`)
    if (profile.deadlineWeeks !== undefined) {
        lines.push(`Deadline: ${profile.deadlineWeeks} weeks${profile.targetEndDate ? ` (until ${profile.targetEndDate})` : ''}`)
    }
    if (profile.preferredFunnel) lines.push(`Funnel: ${funnelTitle(profile.preferredFunnel)}`)
    if (profile.salary) lines.push(`Salary: ${formatSalary(profile.salary)}`)
    if (profile.companyTypes?.length) lines.push(`Company types: ${profile.companyTypes.join(', ')}`)
    if (profile.industries?.length) lines.push(`Industries: ${profile.industries.join(', ')}`)
    if (profile.competencies?.length) lines.push(`Competencies: ${profile.competencies.join(', ')}`)
    if (profile.superpowers?.length) lines.push(`Superpowers:\n${profile.superpowers.map(s => `• ${s}`).join('\n')}`)
    if (profile.constraints) lines.push(`Constraints: ${profile.constraints}`)
    if (profile.linkedinUrl) lines.push(`LinkedIn: ${profile.linkedinUrl}`)
    return lines.join('\n')
}

export function finalizeProfile(draft: ProfileDraft): { ok: true; value: Profile } | { ok: false; error: string } {
    const { levelChoice: _levelChoice, ...fields } = draft
    const parsed = ProfileSchema.safeParse(fields)
    if (!parsed.success) {
        const first = parsed.error.issues[0]
        return { ok: false, error: `Profile is incomplete: ${first.path.join('.') || 'value'} (${first.message}).` }
    }
    return { ok: true, value: parsed.data }
}

function reviewText(draft: ProfileDraft): string {
    return `Here is your profile:\n\n${formatProfile(draft)}\n\nSave it?`
}

export function profileWizard(): WizardDefinition<ProfileDraft, Profile> {
    return {
        title: 'Profile',
        steps: PROFILE_STEPS,
        review: reviewText,
        finalize: finalizeProfile,
    }
}

/** Wizard that re-asks one field group of an existing profile. */
export function profileEditWizard(field: ProfileField): WizardDefinition<ProfileDraft, Profile> {
    return {
        title: `Edit ${field.label.toLowerCase()}`,
        steps: PROFILE_STEPS.filter(step => field.steps.includes(step.id)),
        review: reviewText,
        finalize: finalizeProfile,
    }
}
