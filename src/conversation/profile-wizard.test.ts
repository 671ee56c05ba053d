import { describe, it, expect } from 'vitest'
import {
    clearProfileField,
    findProfileField,
    finalizeProfile,
    formatProfile,
    profileEditWizard,
    profileWizard,
} from './profile-wizard.js'
import type { ProfileDraft } from './profile-wizard.js'
import { applyWizardEvent, startWizard } from './wizard.js'
import type { WizardEvent, WizardState, WizardTransition } from './wizard.js'
import type { Profile } from '../types/schemas.js'

const NOW = new Date('2025-01-06T10:00:00Z')

const BASE: Profile = {
    role: 'Product Manager',
    currentLocation: 'Berlin',
    targetLocation: 'Remote',
    level: 'senior',
    deadlineWeeks: 12,
    targetEndDate: '2025-03-31',
    preferredFunnel: 'active',
}

type Transition = WizardTransition<ProfileDraft, Profile>

function run(start: Transition, events: WizardEvent[]): Transition {
    return events.reduce<Transition>((current, event) => {
        if (current.type !== 'prompt') throw new Error(`wizard ended early on ${event.type}`)
        return applyWizardEvent(profileWizard(), current.state, event, NOW)
    }, start)
}

function stateOf(transition: Transition): WizardState<ProfileDraft> {
    if (transition.type !== 'prompt') throw new Error(`expected prompt, got ${transition.type}`)
    return transition.state
}

const input = (text: string): WizardEvent => ({ type: 'input', text })
const pick = (value: string): WizardEvent => ({ type: 'pick', value })
const skip: WizardEvent = { type: 'skip' }

describe('profile wizard', () => {
    it('collects required and optional fields into a profile', () => {
        const result = run(startWizard(profileWizard(), {}), [
            input('Product Manager'),
            input('Berlin'),
            input('Remote'),
            pick('custom'),
            input('Staff+'),
            input('12'),
            pick('passive'),
            skip,                           // role synonyms
            input('3000-5000 eur/month'),
            pick('smb'),
            pick('enterprise'),
            pick('smb'),                    // toggled off again
            pick('done'),
            skip,                           // industries
            skip,                           // competencies
            skip,                           // superpowers
            skip,                           // constraints
            skip,                           // linkedin
            { type: 'save' },
        ])

        expect(result.type).toBe('commit')
        if (result.type !== 'commit') return
        expect(result.value).toEqual({
            role: 'Product Manager',
            currentLocation: 'Berlin',
            targetLocation: 'Remote',
            level: 'Staff+',
            deadlineWeeks: 12,
            targetEndDate: '2025-03-31',
            preferredFunnel: 'passive',
            salary: { min: 3000, max: 5000, currency: 'EUR', period: 'month' },
            companyTypes: ['enterprise'],
        })
    })

    it('asks for a custom level only when Other was chosen', () => {
        const afterLevel = run(startWizard(profileWizard(), {}), [
            input('PM'), input('Berlin'), input('Remote'), pick('senior'),
        ])
        expect(stateOf(afterLevel).stepId).toBe('deadlineWeeks')
        expect(stateOf(afterLevel).draft.level).toBe('senior')
    })

    it('re-prompts with the reason on invalid input', () => {
        const result = run(startWizard(profileWizard(), {}), [
            input('PM'), input('Berlin'), input('Remote'), pick('lead'), input('60'),
        ])
        expect(result.type === 'prompt' && result.error).toBe('Enter a whole number from 1 to 52.')
        expect(stateOf(result).stepId).toBe('deadlineWeeks')
    })

    it('reaches the review without any optional field', () => {
        const review = run(startWizard(profileWizard(), {}), [
            input('PM'), input('Berlin'), input('Remote'), pick('lead'), input('4'), pick('active'),
            skip, skip, skip, skip, skip, skip, skip, skip,
        ])
        expect(stateOf(review).stepId).toBe('review')
        expect(review.type === 'prompt' && review.text).toBe([
            'Here is your profile:',
            '',
            'Role: PM',
            'Based in: Berlin',
            'Target: Remote',
            'Level: lead',
            'Deadline: 4 weeks (until 2025-02-03)',
            'Funnel: Active',
            '',
            'Save it?',
        ].join('\n'))
    })
})

describe('profile editing', () => {
    it('re-asks a single field on top of the stored profile', () => {
        const field = findProfileField('targetLocation')
        if (!field) throw new Error('missing field')
        const def = profileEditWizard(field)
        const start = startWizard(def, { ...BASE })
        const review = applyWizardEvent(def, stateOf(start), input('Lisbon'), NOW)
        const commit = applyWizardEvent(def, stateOf(review), { type: 'save' }, NOW)
        expect(commit.type === 'commit' && commit.value).toEqual({ ...BASE, targetLocation: 'Lisbon' })
    })

    it('clears optional fields but never required ones', () => {
        const salary = findProfileField('salary')
        const role = findProfileField('role')
        if (!salary || !role) throw new Error('missing field')
        const withSalary: Profile = { ...BASE, salary: { min: 1, max: 2, currency: 'EUR', period: 'year' } }

        expect(clearProfileField(withSalary, salary)).toEqual(BASE)
        expect(clearProfileField(withSalary, role)).toBeNull()
    })
})

describe('finalizeProfile / formatProfile', () => {
    it('names the first missing field', () => {
        const { role: _role, ...rest } = BASE
        expect(finalizeProfile(rest)).toEqual({ ok: false, error: 'Profile is incomplete: role (Required).' })
    })

    it('lists superpowers one per line', () => {
        const text = formatProfile({ superpowers: ['Ship A → revenue', 'Cut B → costs', 'Hire C → speed'] })
        expect(text).toBe('Superpowers:\n• Ship A → revenue\n• Cut B → costs\n• Hire C → speed')
    })
})
