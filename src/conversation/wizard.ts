/**
 * Wizard Engine
 *
 * Generic step-by-step form controller used by the profile, weekly data and
 * reflection flows. Every transition is a pure function of
 * (definition, state, event, now); persistence happens only when the caller
 * receives a `commit` transition.
 *
 * Step visibility is dynamic: a step with a `when` guard is entered only
 * while the guard holds for the current draft.
 */

// ─── Types ──────────────────────────────────────────────────────────────────

export interface WizardChoice {
    label: string
    action: string
}

export type StepOutcome<D> =
    | { ok: true; draft: D; stay?: boolean }
    | { ok: false; error: string }

export interface WizardStep<D> {
    id: string
    prompt: (draft: D) => string
    /** Values offered as buttons; the value comes back as a `pick` event. */
    options?: (draft: D) => WizardChoice[]
    optional?: boolean
    when?: (draft: D) => boolean
    /** `stay: true` keeps the user on this step (multi-select toggles). */
    accept: (draft: D, input: string, now: Date) => StepOutcome<D>
    /** Remove whatever this step wrote into the draft. */
    clear: (draft: D) => D
}

export type FinalizeResult<R> = { ok: true; value: R } | { ok: false; error: string }

export interface WizardDefinition<D, R> {
    title: string
    steps: WizardStep<D>[]
    review: (draft: D) => string
    finalize: (draft: D) => FinalizeResult<R>
}

export const REVIEW_STEP = 'review'

export interface WizardState<D> {
    stepId: string
    /** Step ids visited before the current one, oldest first. */
    trail: string[]
    draft: D
}

export type WizardEvent =
    | { type: 'input'; text: string }
    | { type: 'pick'; value: string }
    | { type: 'skip' }
    | { type: 'back' }
    | { type: 'cancel' }
    | { type: 'save' }

export type WizardTransition<D, R> =
    | { type: 'prompt'; state: WizardState<D>; text: string; choices: WizardChoice[]; error?: string }
    | { type: 'cancelled' }
    | { type: 'commit'; state: WizardState<D>; value: R }

// ─── Button Actions ─────────────────────────────────────────────────────────

export const WIZARD_ACTIONS = {
    pick: 'wiz:pick:',
    skip: 'wiz:skip',
    back: 'wiz:back',
    cancel: 'wiz:cancel',
    save: 'wiz:save',
} as const

/** Map a callback action to a wizard event; null when it isn't a wizard action. */
export function wizardEventFromAction(action: string): WizardEvent | null {
    if (action.startsWith(WIZARD_ACTIONS.pick)) {
        return { type: 'pick', value: action.slice(WIZARD_ACTIONS.pick.length) }
    }
    switch (action) {
        case WIZARD_ACTIONS.skip: return { type: 'skip' }
        case WIZARD_ACTIONS.back: return { type: 'back' }
        case WIZARD_ACTIONS.cancel: return { type: 'cancel' }
        case WIZARD_ACTIONS.save: return { type: 'save' }
        default: return null
    }
}

// ─── Navigation ─────────────────────────────────────────────────────────────

function findStep<D>(def: WizardDefinition<D, unknown>, stepId: string): WizardStep<D> | undefined {
    return def.steps.find(step => step.id === stepId)
}

function isVisible<D>(step: WizardStep<D>, draft: D): boolean {
    return step.when ? step.when(draft) : true
}

/** First visible step after `stepId` (or from the start when null). */
function nextStepId<D>(def: WizardDefinition<D, unknown>, stepId: string | null, draft: D): string {
    const from = stepId === null ? 0 : def.steps.findIndex(step => step.id === stepId) + 1
    for (let i = from; i < def.steps.length; i++) {
        if (isVisible(def.steps[i], draft)) return def.steps[i].id
    }
    return REVIEW_STEP
}

function render<D, R>(
    def: WizardDefinition<D, R>,
    state: WizardState<D>,
    error?: string,
): WizardTransition<D, R> {
    const nav: WizardChoice[] = []
    const canGoBack = state.trail.length > 0

    if (state.stepId === REVIEW_STEP) {
        nav.push({ label: '✅ Save', action: WIZARD_ACTIONS.save })
        if (canGoBack) nav.push({ label: '⬅️ Back', action: WIZARD_ACTIONS.back })
        nav.push({ label: '✖️ Cancel', action: WIZARD_ACTIONS.cancel })
        return { type: 'prompt', state, text: def.review(state.draft), choices: nav, error }
    }

    const step = findStep(def, state.stepId)
    if (!step) {
        // Definition changed under a stored session; restart from the top.
        return startWizard(def, state.draft)
    }

    const options = (step.options?.(state.draft) ?? []).map(option => ({
        label: option.label,
        action: `${WIZARD_ACTIONS.pick}${option.action}`,
    }))
    if (step.optional) nav.push({ label: '⏭ Skip', action: WIZARD_ACTIONS.skip })
    if (canGoBack) nav.push({ label: '⬅️ Back', action: WIZARD_ACTIONS.back })
    nav.push({ label: '✖️ Cancel', action: WIZARD_ACTIONS.cancel })

    return { type: 'prompt', state, text: step.prompt(state.draft), choices: [...options, ...nav], error }
}

function advance<D, R>(def: WizardDefinition<D, R>, state: WizardState<D>, draft: D): WizardTransition<D, R> {
    return render(def, {
        stepId: nextStepId(def, state.stepId, draft),
        trail: [...state.trail, state.stepId],
        draft,
    })
}

// ─── Public API ─────────────────────────────────────────────────────────────

export function startWizard<D, R>(def: WizardDefinition<D, R>, draft: D): WizardTransition<D, R> {
    return render(def, { stepId: nextStepId(def, null, draft), trail: [], draft })
}

/** Re-render the current step without changing anything. */
export function repromptWizard<D, R>(
    def: WizardDefinition<D, R>,
    state: WizardState<D>,
    error?: string,
): WizardTransition<D, R> {
    return render(def, state, error)
}

export function applyWizardEvent<D, R>(
    def: WizardDefinition<D, R>,
    state: WizardState<D>,
    event: WizardEvent,
    now: Date,
): WizardTransition<D, R> {
    if (event.type === 'cancel') return { type: 'cancelled' }

    if (event.type === 'back') {
        const previous = state.trail[state.trail.length - 1]
        if (previous === undefined) {
            return render(def, state, 'You’re on the first step; there is nothing to go back to.')
        }
        const leaving = findStep(def, state.stepId)
        const draft = leaving ? leaving.clear(state.draft) : state.draft
        return render(def, { stepId: previous, trail: state.trail.slice(0, -1), draft })
    }

    if (state.stepId === REVIEW_STEP) {
        const wantsSave = event.type === 'save'
            || (event.type === 'input' && /^(save|yes|ok)$/i.test(event.text.trim()))
        if (!wantsSave) {
            return render(def, state, 'Tap Save to store this, Back to change it, or Cancel to discard.')
        }
        const result = def.finalize(state.draft)
        if (!result.ok) return render(def, state, result.error)
        return { type: 'commit', state, value: result.value }
    }

    const step = findStep(def, state.stepId)
    if (!step) return startWizard(def, state.draft)

    switch (event.type) {
        case 'save':
            return render(def, state, 'Finish the remaining steps first.')
        case 'skip':
            if (!step.optional) return render(def, state, 'This step is required and can’t be skipped.')
            return advance(def, state, step.clear(state.draft))
        case 'input':
        case 'pick': {
            const input = event.type === 'input' ? event.text : event.value
            const outcome = step.accept(state.draft, input, now)
            if (!outcome.ok) return render(def, state, outcome.error)
            if (outcome.stay) return render(def, { ...state, draft: outcome.draft })
            return advance(def, state, outcome.draft)
        }
    }
}
