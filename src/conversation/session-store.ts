/**
 * Per-user conversation state. Lives only in process memory: nothing a user
 * types is persisted until a wizard commits. Idle sessions expire so a
 * half-finished form doesn't hijack a message days later.
 */

import type { ProfileDraft } from './profile-wizard.js'
import type { ReflectionContext, ReflectionDraft } from './reflection-wizard.js'
import type { WeekContext, WeekDraft } from './week-wizard.js'
import type { WizardState } from './wizard.js'

// ─── Session Shapes ───────────────────────────────────────────────────────────

export type Session =
    | { kind: 'profile'; state: WizardState<ProfileDraft> }
    | { kind: 'profile_edit'; field: string; state: WizardState<ProfileDraft> }
    | { kind: 'week'; context: WeekContext; state: WizardState<WeekDraft> }
    | { kind: 'reflection_offer'; context: ReflectionContext }
    | { kind: 'reflection'; context: ReflectionContext; state: WizardState<ReflectionDraft> }
    | { kind: 'channel_name' }

export type SessionKind = Session['kind']

export const SESSION_IDLE_MS = 24 * 60 * 60 * 1000

interface SessionEntry {
    session: Session
    touchedAt: number
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SessionStore {
    private readonly entries = new Map<string, SessionEntry>()

    constructor(
        private readonly idleMs: number = SESSION_IDLE_MS,
        private readonly clock: () => number = Date.now,
    ) {}

    get(userId: string): Session | undefined {
        const entry = this.entries.get(userId)
        if (!entry) return undefined
        if (this.clock() - entry.touchedAt > this.idleMs) {
            this.entries.delete(userId)
            console.log(`[Conversation] Session expired for user=${userId} kind=${entry.session.kind}`)
            return undefined
        }
        return entry.session
    }

    set(userId: string, session: Session): void {
        this.entries.set(userId, { session, touchedAt: this.clock() })
    }

    clear(userId: string): void {
        this.entries.delete(userId)
    }

    get size(): number {
        return this.entries.size
    }
}
