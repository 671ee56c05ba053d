/**
 * Conversation Service
 *
 * Entry point for every inbound chat event. Routes slash commands, button
 * actions and free text to the menu, the reports or the active wizard, and
 * turns wizard commits into store writes.
 *
 * Events for one user run strictly in order (keyed promise chain); different
 * users proceed concurrently. A wizard's session is cleared only after its
 * commit has been written, so a failed save can simply be retried.
 */

import { isTimeOfDay, isValidTimezone } from '../config.js'
import { formatHistory } from '../funnel/history.js'
import { formatRate, ratesForCounts } from '../funnel/metrics.js'
import { FUNNEL_TYPES, funnelTitle, isFunnelType, otherFunnel, resolveSlot } from '../funnel/model.js'
import type { FunnelType } from '../funnel/model.js'
import { detectQualifyingStages } from '../funnel/reflection-trigger.js'
import type { QualifyingIncrease } from '../funnel/reflection-trigger.js'
import { buildSummary, formatSummary } from '../funnel/summary.js'
import { normalizeWeekStart } from '../funnel/week.js'
import { buildCsvExport, exportFilename } from '../export/csv.js'
import { WeekFunnelMismatchError } from '../store/types.js'
import type { ChannelDeletePolicy, FunnelStore, ReminderFrequency, WeekDataChange, WeekKey } from '../store/types.js'
import { safeError } from '../utils/safe-log.js'
import {
    clearProfileField,
    findProfileField,
    formatProfile,
    PROFILE_FIELDS,
    profileEditWizard,
    profileWizard,
} from './profile-wizard.js'
import type { ProfileDraft } from './profile-wizard.js'
import { emptyReflectionDraft, reflectionWizard } from './reflection-wizard.js'
import type { ReflectionContext } from './reflection-wizard.js'
import { SessionStore } from './session-store.js'
import type { Session } from './session-store.js'
import { parseCount, parseText } from './validators.js'
import { emptyWeekDraft, formatCountsBlock, weekWizard } from './week-wizard.js'
import type { WeekContext, WeekSubmission } from './week-wizard.js'
import {
    applyWizardEvent,
    repromptWizard,
    startWizard,
    wizardEventFromAction,
} from './wizard.js'
import type { WizardChoice, WizardDefinition, WizardEvent, WizardState, WizardTransition } from './wizard.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface BotDocument {
    filename: string
    content: string
    mimeType: string
    caption?: string
}

export interface BotReply {
    text: string
    choices?: WizardChoice[]
    document?: BotDocument
}

interface InboundBase {
    userId: string
    username?: string | null
}

export type InboundEvent =
    | (InboundBase & { kind: 'text'; text: string })
    | (InboundBase & { kind: 'action'; action: string })

export interface ConversationOptions {
    store: FunnelStore
    sessions?: SessionStore
    channelDeletePolicy?: ChannelDeletePolicy
    clock?: () => Date
    summaryWeeks?: number
    /** Zone for week keys when the user hasn't set one. */
    defaultTimezone?: string
}

interface CommitOutcome {
    replies: BotReply[]
    next?: Session
}

export const GENERIC_FAILURE = 'Something went wrong on our side. Please try again in a moment.'
export const SAVE_FAILURE = 'Couldn’t save right now. Your answers are kept; tap Save to try again.'
export const FORM_DISCARDED = 'The previous unfinished form was discarded.'

const MAX_CHANNEL_NAME = 50
const MAX_CHANNELS = 20

const HELP_TEXT = [
    'I track your weekly job-search funnel and show conversion rates between stages.',
    '',
    '/week – add numbers for a week and channel',
    '/history – all saved weeks',
    '/summary [weeks] – totals and CVR for recent weeks',
    '/export – CSV for spreadsheets',
    '/profile – view or create your profile',
    '/edit <week> <channel> <stage> <value> – correct one number',
    '/timezone <Area/City> – timezone for reminders',
    '/remindat <HH:MM> – reminder time ("default" to reset)',
    '/menu – main menu',
    '',
    'Inside a form: /back, /skip, /save, /cancel.',
].join('\n')

function noop(): void {}

function withError(text: string, error?: string): string {
    return error ? `⚠️ ${error}\n\n${text}` : text
}

function increaseSummary(increases: QualifyingIncrease[]): string {
    return increases.map(increase => `${increase.label} +${increase.delta}`).join(', ')
}

// ─── Service ────────────────────────────────────────────────────────────────

export class ConversationService {
    private readonly store: FunnelStore
    private readonly sessions: SessionStore
    private readonly channelDeletePolicy: ChannelDeletePolicy
    private readonly clock: () => Date
    private readonly summaryWeeks: number
    private readonly defaultTimezone: string
    private readonly queues = new Map<string, Promise<void>>()

    constructor(options: ConversationOptions) {
        this.store = options.store
        this.sessions = options.sessions ?? new SessionStore()
        this.channelDeletePolicy = options.channelDeletePolicy ?? 'orphan'
        this.clock = options.clock ?? (() => new Date())
        this.summaryWeeks = options.summaryWeeks ?? 4
        this.defaultTimezone = options.defaultTimezone ?? 'UTC'
    }

    /** Current session kind for a user; exposed for diagnostics and tests. */
    sessionKind(userId: string): Session['kind'] | undefined {
        return this.sessions.get(userId)?.kind
    }

    handle(event: InboundEvent): Promise<BotReply[]> {
        const userId = event.userId
        const previous = this.queues.get(userId) ?? Promise.resolve()
        const run = previous.then(() => this.process(event))
        // The queue only tracks completion; failures reach the caller through `run`.
        const settled = run.then(noop, noop)
        this.queues.set(userId, settled)
        return run.finally(() => {
            if (this.queues.get(userId) === settled) this.queues.delete(userId)
        })
    }

    private async process(event: InboundEvent): Promise<BotReply[]> {
        try {
            await this.store.ensureUser(event.userId, event.username ?? null)
            if (event.kind === 'action') return await this.onAction(event.userId, event.action)

            const text = event.text.trim()
            if (text.startsWith('/')) return await this.onCommand(event.userId, text)
            return await this.onText(event.userId, text)
        } catch (err) {
            console.error(`[Conversation] Failed to handle ${event.kind} for user=${event.userId}:`, safeError(err))
            return [{ text: GENERIC_FAILURE }]
        }
    }

    // ─── Routing ────────────────────────────────────────────────────────────

    private async onCommand(userId: string, text: string): Promise<BotReply[]> {
        const [rawCommand, ...args] = text.split(/\s+/)
        const command = rawCommand.toLowerCase().replace(/@\w+$/, '')

        switch (command) {
            case '/start': {
                const profile = await this.store.getProfile(userId)
                const greeting = profile
                    ? 'Welcome back! Here is your menu.'
                    : 'Hi! I help you track your job-search funnel week by week.\nStart by adding a channel (e.g. LinkedIn) and your first week of numbers. You can also create a profile.'
                return [{ text: greeting }, ...(await this.menu(userId))]
            }
            case '/menu':
                return this.menu(userId)
            case '/help':
                return [{ text: HELP_TEXT }]
            case '/profile':
                return this.showProfile(userId)
            case '/week':
                return this.startWeek(userId)
            case '/history':
                return this.history(userId)
            case '/summary':
                return this.summary(userId, args[0])
            case '/export':
                return this.exportCsv(userId)
            case '/edit':
                return this.editWeekCount(userId, args)
            case '/timezone':
                return this.setTimezone(userId, args[0])
            case '/remindat':
                return this.setReminderTime(userId, args[0])
            case '/cancel':
                return this.navigate(userId, { type: 'cancel' })
            case '/skip':
                return this.navigate(userId, { type: 'skip' })
            case '/back':
                return this.navigate(userId, { type: 'back' })
            case '/save':
                return this.navigate(userId, { type: 'save' })
            default:
                return [{ text: `Unknown command ${command}. Try /help.` }]
        }
    }

    private async onAction(userId: string, action: string): Promise<BotReply[]> {
        const wizardEvent = wizardEventFromAction(action)
        if (wizardEvent) return this.navigate(userId, wizardEvent)

        const [head, sub, arg] = action.split(':')
        switch (head) {
            case 'menu':
                return this.menu(userId)
            case 'week':
                return this.startWeek(userId)
            case 'history':
                return this.history(userId)
            case 'summary':
                return this.summary(userId)
            case 'export':
                return this.exportCsv(userId)
            case 'channels':
                if (sub === 'add') return this.askChannelName(userId)
                if (sub === 'remove' && arg !== undefined) return this.removeChannel(userId, arg)
                return this.showChannels(userId)
            case 'funnel':
                return this.switchFunnel(userId, sub)
            case 'reminders':
                return sub ? this.setReminderFrequency(userId, sub) : this.showReminders(userId)
            case 'profile':
                return this.onProfileAction(userId, sub, arg)
            case 'reflect':
                return this.answerReflectionOffer(userId, sub === 'yes')
            default:
                console.warn(`[Conversation] Unknown action "${action}" from user=${userId}`)
                return this.menu(userId)
        }
    }

    private async onText(userId: string, text: string): Promise<BotReply[]> {
        const session = this.sessions.get(userId)
        if (!session) {
            return [{ text: 'Use the menu below or /help to see what I can do.' }, ...(await this.menu(userId))]
        }
        switch (session.kind) {
            case 'channel_name':
                return this.addChannel(userId, text)
            case 'reflection_offer': {
                const answer = text.toLowerCase()
                if (/^(yes|y|ok|sure)$/.test(answer)) return this.answerReflectionOffer(userId, true)
                if (/^(no|n|later|skip)$/.test(answer)) return this.answerReflectionOffer(userId, false)
                return [this.reflectionOfferReply(session.context, 'Please answer Yes or No.')]
            }
            default:
                return this.navigate(userId, { type: 'input', text })
        }
    }

    // ─── Wizards ────────────────────────────────────────────────────────────

    private async navigate(userId: string, event: WizardEvent): Promise<BotReply[]> {
        const session = this.sessions.get(userId)
        if (!session) {
            if (event.type === 'cancel') return [{ text: 'Nothing to cancel.' }, ...(await this.menu(userId))]
            return [{ text: 'There is no form in progress.' }, ...(await this.menu(userId))]
        }

        switch (session.kind) {
            case 'profile':
                return this.drive(userId, profileWizard(), session.state, event,
                    state => ({ kind: 'profile', state }),
                    profile => this.store.saveProfile(userId, profile, { seedActiveFunnel: true }),
                    async profile => ({
                        replies: [{ text: `✅ Profile saved.\n\n${formatProfile(profile)}` }, ...(await this.menu(userId))],
                    }))
            case 'profile_edit': {
                const field = findProfileField(session.field)
                if (!field) {
                    this.sessions.clear(userId)
                    return this.menu(userId)
                }
                return this.drive(userId, profileEditWizard(field), session.state, event,
                    state => ({ kind: 'profile_edit', field: field.field, state }),
                    profile => this.store.saveProfile(userId, profile, { seedActiveFunnel: field.field === 'preferredFunnel' }),
                    async profile => ({ replies: [{ text: `✅ ${field.label} updated.\n\n${formatProfile(profile)}` }] }))
            }
            case 'week': {
                const context = session.context
                const keyFor = (submission: WeekSubmission): WeekKey =>
                    ({ userId, weekStart: submission.weekStart, channel: submission.channel })
                return this.drive(userId, weekWizard(context), session.state, event,
                    state => ({ kind: 'week', context, state }),
                    async submission => {
                        const key = keyFor(submission)
                        const change = await this.store.addWeekData(key, context.funnel, submission.counts)
                        console.log(`[Conversation] Week data saved user=${userId} week=${key.weekStart} channel=${key.channel}`)
                        return change
                    },
                    (submission, change) => this.afterWeekChange(keyFor(submission), change, '✅ Saved.'))
            }
            case 'reflection': {
                const context = session.context
                return this.drive(userId, reflectionWizard(context), session.state, event,
                    state => ({ kind: 'reflection', context, state }),
                    async entries => {
                        const saved = await this.store.saveReflections(entries.map(entry => ({
                            userId,
                            weekStart: context.weekStart,
                            channel: context.channel,
                            funnelType: context.funnel,
                            ...entry,
                        })))
                        console.log(`[Conversation] Reflection saved user=${userId} sections=${saved.length}`)
                    },
                    async () => ({
                        replies: [{ text: '✅ Reflection saved. Thanks for taking the time!' }, ...(await this.menu(userId))],
                    }))
            }
            case 'reflection_offer':
                if (event.type === 'cancel' || event.type === 'skip') return this.answerReflectionOffer(userId, false)
                return [this.reflectionOfferReply(session.context, 'Please answer Yes or No.')]
            case 'channel_name':
                if (event.type === 'cancel' || event.type === 'back') {
                    this.sessions.clear(userId)
                    return this.showChannels(userId)
                }
                return [{ text: 'Send the channel name, or /cancel.' }]
        }
    }

    /**
     * Apply one event to a wizard. On commit, `persist` runs first; only once
     * it has succeeded is the session cleared and `after` asked for replies.
     */
    private async drive<D, R, T>(
        userId: string,
        def: WizardDefinition<D, R>,
        state: WizardState<D>,
        event: WizardEvent,
        wrap: (state: WizardState<D>) => Session,
        persist: (value: R) => Promise<T>,
        after: (value: R, result: T) => Promise<CommitOutcome>,
    ): Promise<BotReply[]> {
        const transition = applyWizardEvent(def, state, event, this.clock())

        if (transition.type === 'cancelled') {
            this.sessions.clear(userId)
            return [{ text: 'Cancelled. Nothing was saved.' }, ...(await this.menu(userId))]
        }
        if (transition.type === 'prompt') {
            this.sessions.set(userId, wrap(transition.state))
            return [this.promptReply(transition)]
        }

        let result: T
        try {
            result = await persist(transition.value)
        } catch (err) {
            if (err instanceof WeekFunnelMismatchError) {
                // Another submission stored the row under the other funnel after the form started.
                this.sessions.clear(userId)
                console.warn(`[Conversation] Week data refused user=${userId}: ${err.message}`)
                return [{
                    text: `Nothing was saved: ${err.key.channel} already has ${funnelTitle(err.storedFunnel)} funnel numbers for the week of ${err.key.weekStart}.`,
                }, ...(await this.menu(userId))]
            }
            console.error(`[Conversation] Save failed for user=${userId}:`, safeError(err))
            const retry = repromptWizard(def, transition.state)
            return [{ text: SAVE_FAILURE, choices: retry.type === 'prompt' ? retry.choices : undefined }]
        }
        this.sessions.clear(userId)

        const outcome = await after(transition.value, result)
        if (outcome.next) this.sessions.set(userId, outcome.next)
        return outcome.replies
    }

    private promptReply<D, R>(transition: Extract<WizardTransition<D, R>, { type: 'prompt' }>): BotReply {
        return { text: withError(transition.text, transition.error), choices: transition.choices }
    }

    private begin<D, R>(userId: string, def: WizardDefinition<D, R>, draft: D, wrap: (state: WizardState<D>) => Session): BotReply[] {
        const replaced = this.sessions.get(userId)
        const transition = startWizard(def, draft)
        if (transition.type !== 'prompt') return []
        this.sessions.set(userId, wrap(transition.state))
        const replies: BotReply[] = []
        if (replaced) replies.push({ text: FORM_DISCARDED })
        replies.push(this.promptReply(transition))
        return replies
    }

    // ─── Weekly Data & Reflection ───────────────────────────────────────────

    private async startWeek(userId: string): Promise<BotReply[]> {
        const channels = await this.store.listChannels(userId)
        if (channels.length === 0) {
            return [{
                text: 'Add at least one channel first (e.g. LinkedIn, referrals, job boards).',
                choices: [{ label: '➕ Add channel', action: 'channels:add' }, { label: '🏠 Menu', action: 'menu' }],
            }]
        }
        const user = await this.store.getUser(userId)
        const funnel = user?.activeFunnel ?? 'active'
        const timezone = user?.reminderTimezone && isValidTimezone(user.reminderTimezone)
            ? user.reminderTimezone
            : this.defaultTimezone
        const otherFunnelRows = (await this.store.listWeekData(userId))
            .filter(row => row.funnelType !== funnel)
            .map(row => ({ weekStart: row.weekStart, channel: row.channel }))
        const context: WeekContext = { funnel, channels: channels.map(channel => channel.name), timezone, otherFunnelRows }
        return this.begin(userId, weekWizard(context), emptyWeekDraft(), state => ({ kind: 'week', context, state }))
    }

    private async afterWeekChange(key: WeekKey, change: WeekDataChange, headline: string): Promise<CommitOutcome> {
        const rates = ratesForCounts(change.current).map((rate, i) => `CVR${i + 1} ${formatRate(rate)}`).join(' · ')
        const replies: BotReply[] = [{
            text: [
                `${headline} ${key.channel}, week of ${key.weekStart}:`,
                '',
                formatCountsBlock(change.funnelType, change.current),
                '',
                rates,
            ].join('\n'),
        }]

        const increases = detectQualifyingStages(change.previous, change.current, change.funnelType)
        if (increases.length === 0) {
            replies.push(...(await this.menu(key.userId)))
            return { replies }
        }
        const context: ReflectionContext = {
            weekStart: key.weekStart,
            channel: key.channel,
            funnel: change.funnelType,
            increases,
        }
        replies.push(this.reflectionOfferReply(context))
        return { replies, next: { kind: 'reflection_offer', context } }
    }

    private reflectionOfferReply(context: ReflectionContext, error?: string): BotReply {
        return {
            text: withError(`You moved forward: ${increaseSummary(context.increases)}.\nWant to reflect on it? It takes a minute.`, error),
            choices: [
                { label: '📝 Yes, reflect', action: 'reflect:yes' },
                { label: 'Not now', action: 'reflect:no' },
            ],
        }
    }

    private async answerReflectionOffer(userId: string, accepted: boolean): Promise<BotReply[]> {
        const session = this.sessions.get(userId)
        if (!session || session.kind !== 'reflection_offer') {
            return [{ text: 'That reflection offer has expired.' }, ...(await this.menu(userId))]
        }
        if (!accepted) {
            this.sessions.clear(userId)
            return [{ text: 'No problem.' }, ...(await this.menu(userId))]
        }
        const context = session.context
        this.sessions.clear(userId)
        return this.begin(userId, reflectionWizard(context), emptyReflectionDraft(context),
            state => ({ kind: 'reflection', context, state }))
    }

    /** `/edit <week> <channel…> <stage> <value>`: overwrite one stored count. */
    private async editWeekCount(userId: string, args: string[]): Promise<BotReply[]> {
        const usage = 'Usage: /edit <YYYY-MM-DD> <channel> <stage> <value>\nExample: /edit 2025-01-06 LinkedIn responses 4'
        if (args.length < 4) return [{ text: usage }]

        const weekStart = normalizeWeekStart(args[0])
        const channelName = args.slice(1, -2).join(' ')
        const slotName = args[args.length - 2]
        const value = parseCount(args[args.length - 1])
        if (!weekStart) return [{ text: `Invalid date "${args[0]}".\n${usage}` }]
        if (!value.ok) return [{ text: value.error }]

        const channels = await this.store.listChannels(userId)
        const channel = channels.find(entry => entry.name.toLowerCase() === channelName.toLowerCase())?.name ?? channelName
        const key: WeekKey = { userId, weekStart, channel }
        const existing = await this.store.getWeekData(key)
        if (!existing) return [{ text: `No data for ${channel} in the week of ${weekStart}.` }]

        const slot = resolveSlot(existing.funnelType, slotName)
        if (!slot) return [{ text: `Unknown stage "${slotName}".\n${usage}` }]

        const change = await this.store.setWeekCount(key, slot, value.value)
        if (!change) return [{ text: `No data for ${channel} in the week of ${weekStart}.` }]
        console.log(`[Conversation] Week data corrected user=${userId} week=${weekStart} channel=${channel} slot=${slot}`)

        const replaced = this.sessions.get(userId)
        const outcome = await this.afterWeekChange(key, change, '✏️ Updated.')
        if (!outcome.next) return outcome.replies
        this.sessions.set(userId, outcome.next)
        return replaced ? [{ text: FORM_DISCARDED }, ...outcome.replies] : outcome.replies
    }

    // ─── Reports ────────────────────────────────────────────────────────────

    private async rowsForActiveFunnel(userId: string) {
        const funnel = await this.activeFunnel(userId)
        const rows = (await this.store.listWeekData(userId)).filter(row => row.funnelType === funnel)
        return { funnel, rows }
    }

    private async history(userId: string): Promise<BotReply[]> {
        const { funnel, rows } = await this.rowsForActiveFunnel(userId)
        return [{ text: formatHistory(rows, funnel), choices: [{ label: '🏠 Menu', action: 'menu' }] }]
    }

    private async summary(userId: string, weeksArg?: string): Promise<BotReply[]> {
        let weeks = this.summaryWeeks
        if (weeksArg !== undefined) {
            const parsed = parseCount(weeksArg)
            if (!parsed.ok || parsed.value < 1 || parsed.value > 52) {
                return [{ text: 'Usage: /summary [weeks], weeks from 1 to 52.' }]
            }
            weeks = parsed.value
        }
        const { funnel, rows } = await this.rowsForActiveFunnel(userId)
        return [{ text: formatSummary(buildSummary(rows, weeks, funnel), weeks), choices: [{ label: '🏠 Menu', action: 'menu' }] }]
    }

    /** Every stored row of both funnels; the header follows the active funnel. */
    private async exportCsv(userId: string): Promise<BotReply[]> {
        const funnel = await this.activeFunnel(userId)
        const rows = await this.store.listWeekData(userId)
        const caption = rows.length === 0
            ? 'No data yet; here is an empty template.'
            : `Funnel data: ${rows.length} row(s).`
        return [{
            text: caption,
            document: {
                filename: exportFilename(funnel, this.clock()),
                content: buildCsvExport(rows, funnel),
                mimeType: 'text/csv',
                caption,
            },
        }]
    }

    // ─── Menu & Settings ────────────────────────────────────────────────────

    private async activeFunnel(userId: string): Promise<FunnelType> {
        const user = await this.store.getUser(userId)
        return user?.activeFunnel ?? 'active'
    }

    private async menu(userId: string): Promise<BotReply[]> {
        const funnel = await this.activeFunnel(userId)
        const other = otherFunnel(funnel)
        return [{
            text: `Main menu · ${funnelTitle(funnel)} funnel`,
            choices: [
                { label: '➕ Add week data', action: 'week' },
                { label: '📊 History', action: 'history' },
                { label: '📈 Summary', action: 'summary' },
                { label: '📤 Export CSV', action: 'export' },
                { label: '📡 Channels', action: 'channels' },
                { label: `🔀 Switch to ${funnelTitle(other)} funnel`, action: `funnel:${other}` },
                { label: '⏰ Reminders', action: 'reminders' },
                { label: '👤 Profile', action: 'profile' },
            ],
        }]
    }

    private async switchFunnel(userId: string, value: string | undefined): Promise<BotReply[]> {
        if (!isFunnelType(value)) {
            return [{ text: `Unknown funnel. Choose one of: ${FUNNEL_TYPES.join(', ')}.` }, ...(await this.menu(userId))]
        }
        await this.store.setActiveFunnel(userId, value)
        return [{ text: `Switched to the ${funnelTitle(value)} funnel.` }, ...(await this.menu(userId))]
    }

    private async showChannels(userId: string): Promise<BotReply[]> {
        const channels = await this.store.listChannels(userId)
        const text = channels.length === 0
            ? 'You have no channels yet.'
            : `Your channels:\n${channels.map(channel => `• ${channel.name}`).join('\n')}\n\nTap one to remove it.`
        return [{
            text,
            choices: [
                // Ids rather than list positions, so an old keyboard can't hit a different channel.
                ...channels.map(channel => ({ label: `🗑 ${channel.name}`, action: `channels:remove:${channel.id}` })),
                { label: '➕ Add channel', action: 'channels:add' },
                { label: '🏠 Menu', action: 'menu' },
            ],
        }]
    }

    private askChannelName(userId: string): BotReply[] {
        this.sessions.set(userId, { kind: 'channel_name' })
        return [{
            text: `Send the channel name (up to ${MAX_CHANNEL_NAME} characters), e.g. LinkedIn.`,
            choices: [{ label: '✖️ Cancel', action: 'wiz:cancel' }],
        }]
    }

    private async addChannel(userId: string, text: string): Promise<BotReply[]> {
        const name = parseText(text, MAX_CHANNEL_NAME)
        if (!name.ok) return [{ text: `${name.error} Send the channel name, or /cancel.` }]

        const channels = await this.store.listChannels(userId)
        if (channels.length >= MAX_CHANNELS) {
            this.sessions.clear(userId)
            return [{ text: `You already have ${MAX_CHANNELS} channels. Remove one first.` }, ...(await this.showChannels(userId))]
        }
        const added = await this.store.addChannel(userId, name.value)
        this.sessions.clear(userId)
        const note = added ? `✅ Channel "${name.value}" added.` : `You already have a channel called "${name.value}".`
        return [{ text: note }, ...(await this.showChannels(userId))]
    }

    private async removeChannel(userId: string, channelId: string): Promise<BotReply[]> {
        const result = await this.store.removeChannel(userId, channelId, this.channelDeletePolicy)
        const name = result.channel
        if (name === null) {
            return [{ text: 'That channel was already removed.' }, ...(await this.showChannels(userId))]
        }
        console.log(`[Conversation] Channel removed user=${userId} channel=${name} policy=${this.channelDeletePolicy}`)
        const note = this.channelDeletePolicy === 'cascade'
            ? `Removed "${name}" and ${result.deletedWeekRows} week row(s) of its data.`
            : `Removed "${name}". Its history stays in reports and exports.`
        return [{ text: note }, ...(await this.showChannels(userId))]
    }

    private async showReminders(userId: string): Promise<BotReply[]> {
        const user = await this.store.getUser(userId)
        const frequency = user?.reminderFrequency ?? 'off'
        const lines = [
            `Reminders: ${frequency}`,
            `Time: ${user?.reminderTime ?? 'default'} · Timezone: ${user?.reminderTimezone ?? 'default'}`,
            '',
            'Change the time with /remindat HH:MM and the timezone with /timezone Area/City.',
        ]
        const options: ReminderFrequency[] = ['daily', 'weekly', 'off']
        return [{
            text: lines.join('\n'),
            choices: [
                ...options.map(option => ({
                    label: `${option === frequency ? '● ' : ''}${option[0].toUpperCase()}${option.slice(1)}`,
                    action: `reminders:${option}`,
                })),
                { label: '🏠 Menu', action: 'menu' },
            ],
        }]
    }

    private async setReminderFrequency(userId: string, value: string): Promise<BotReply[]> {
        if (value !== 'off' && value !== 'daily' && value !== 'weekly') return this.showReminders(userId)
        await this.store.updateReminderSettings(userId, { frequency: value })
        return this.showReminders(userId)
    }

    private async setTimezone(userId: string, value: string | undefined): Promise<BotReply[]> {
        if (!value || !isValidTimezone(value)) {
            return [{ text: 'Usage: /timezone Area/City, e.g. /timezone Europe/Berlin' }]
        }
        await this.store.updateReminderSettings(userId, { timezone: value })
        return [{ text: `Timezone set to ${value}.` }]
    }

    private async setReminderTime(userId: string, value: string | undefined): Promise<BotReply[]> {
        if (value?.toLowerCase() === 'default') {
            await this.store.updateReminderSettings(userId, { time: null })
            return [{ text: 'Reminder time reset to the default.' }]
        }
        if (!value || !isTimeOfDay(value)) {
            return [{ text: 'Usage: /remindat HH:MM (24-hour), e.g. /remindat 19:30' }]
        }
        await this.store.updateReminderSettings(userId, { time: value })
        return [{ text: `Reminders will arrive at ${value}.` }]
    }

    // ─── Profile ────────────────────────────────────────────────────────────

    private async showProfile(userId: string): Promise<BotReply[]> {
        const profile = await this.store.getProfile(userId)
        if (!profile) {
            return [{
                text: 'You don’t have a profile yet. It helps put your numbers in context.',
                choices: [{ label: '👤 Create profile', action: 'profile:create' }, { label: '🏠 Menu', action: 'menu' }],
            }]
        }
        return [{
            text: formatProfile(profile),
            choices: [
                { label: '✏️ Edit a field', action: 'profile:edit' },
                { label: '🗑 Delete profile', action: 'profile:delete' },
                { label: '🏠 Menu', action: 'menu' },
            ],
        }]
    }

    private async onProfileAction(userId: string, sub: string | undefined, arg: string | undefined): Promise<BotReply[]> {
        switch (sub) {
            case 'create':
                return this.begin(userId, profileWizard(), {}, state => ({ kind: 'profile', state }))
            case 'edit':
                return arg ? this.editProfileField(userId, arg) : this.profileFieldPicker(userId)
            case 'clear':
                return arg ? this.clearProfileField(userId, arg) : this.profileFieldPicker(userId)
            case 'delete':
                if (arg === 'confirm') {
                    const deleted = await this.store.deleteProfile(userId)
                    return [{ text: deleted ? 'Profile deleted.' : 'There was no profile to delete.' }, ...(await this.menu(userId))]
                }
                return [{
                    text: 'Delete your profile? Your funnel data stays.',
                    choices: [
                        { label: 'Yes, delete', action: 'profile:delete:confirm' },
                        { label: 'Keep it', action: 'profile' },
                    ],
                }]
            default:
                return this.showProfile(userId)
        }
    }

    private async profileFieldPicker(userId: string): Promise<BotReply[]> {
        const profile = await this.store.getProfile(userId)
        if (!profile) return this.showProfile(userId)
        return [{
            text: 'Which field? Optional fields can also be cleared.',
            choices: [
                ...PROFILE_FIELDS.map(field => ({ label: `✏️ ${field.label}`, action: `profile:edit:${field.field}` })),
                ...PROFILE_FIELDS.filter(field => field.optional)
                    .map(field => ({ label: `🧹 Clear ${field.label.toLowerCase()}`, action: `profile:clear:${field.field}` })),
                { label: '🏠 Menu', action: 'menu' },
            ],
        }]
    }

    private async editProfileField(userId: string, fieldName: string): Promise<BotReply[]> {
        const field = findProfileField(fieldName)
        const profile = await this.store.getProfile(userId)
        if (!field || !profile) return this.showProfile(userId)
        const { userId: _owner, createdAt: _created, updatedAt: _updated, ...stored } = profile
        const draft: ProfileDraft = stored
        return this.begin(userId, profileEditWizard(field), draft,
            state => ({ kind: 'profile_edit', field: field.field, state }))
    }

    private async clearProfileField(userId: string, fieldName: string): Promise<BotReply[]> {
        const field = findProfileField(fieldName)
        const profile = await this.store.getProfile(userId)
        if (!field || !profile) return this.showProfile(userId)
        const cleared = clearProfileField(profile, field)
        if (!cleared) return [{ text: `${field.label} is required and can’t be cleared; edit it instead.` }]
        await this.store.saveProfile(userId, cleared)
        return [{ text: `${field.label} cleared.` }, ...(await this.showProfile(userId))]
    }
}
