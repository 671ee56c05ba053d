/**
 * Telegram Bot API adapter: update parsing and outbound calls over fetch.
 */

import { z } from 'zod'
import type { BotDocument, BotReply, InboundEvent } from '../conversation/service.js'
import type { WizardChoice } from '../conversation/wizard.js'

// Telegram's hard limit is 4096 characters per message.
export const MAX_MESSAGE_LENGTH = 4000

// ============================================
// Update parsing
// ============================================

const TelegramUserSchema = z.object({
  id: z.number(),
  username: z.string().optional(),
})

const TelegramChatSchema = z.object({ id: z.number() })

const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: z.object({
    chat: TelegramChatSchema,
    from: TelegramUserSchema.optional(),
    text: z.string().optional(),
  }).optional(),
  callback_query: z.object({
    id: z.string(),
    from: TelegramUserSchema,
    data: z.string().optional(),
    message: z.object({ chat: TelegramChatSchema }).optional(),
  }).optional(),
})

export interface TelegramInbound {
  chatId: string
  event: InboundEvent
  callbackQueryId?: string
}

/** Text messages and button taps become inbound events; anything else is ignored. */
export function parseTelegramUpdate(body: unknown): TelegramInbound | null {
  const parsed = TelegramUpdateSchema.safeParse(body)
  if (!parsed.success) return null
  const update = parsed.data

  if (update.callback_query) {
    const query = update.callback_query
    if (!query.data) return null
    const userId = String(query.from.id)
    return {
      chatId: query.message ? String(query.message.chat.id) : userId,
      callbackQueryId: query.id,
      event: { kind: 'action', userId, username: query.from.username ?? null, action: query.data },
    }
  }

  const message = update.message
  if (!message?.text || !message.from) return null
  return {
    chatId: String(message.chat.id),
    event: {
      kind: 'text',
      userId: String(message.from.id),
      username: message.from.username ?? null,
      text: message.text,
    },
  }
}

// ============================================
// Outbound
// ============================================

export class TelegramApiError extends Error {
  constructor(readonly method: string, readonly status: number, description: string) {
    super(`Telegram ${method} failed (${status}): ${description}`)
    this.name = 'TelegramApiError'
  }
}

const ApiErrorSchema = z.object({ description: z.string() })

export function inlineKeyboard(choices: WizardChoice[]) {
  return { inline_keyboard: choices.map(c => [{ text: c.label, callback_data: c.action }]) }
}

/** Split on line boundaries so each chunk fits one message. */
export function splitMessage(text: string, limit = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= limit) return [text]
  const chunks: string[] = []
  let current = ''
  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line
    if (candidate.length <= limit) {
      current = candidate
      continue
    }
    if (current) chunks.push(current)
    current = line
    while (current.length > limit) {
      chunks.push(current.slice(0, limit))
      current = current.slice(limit)
    }
  }
  if (current) chunks.push(current)
  return chunks
}

export class TelegramClient {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  private url(method: string): string {
    return `https://api.telegram.org/bot${this.token}/${method}`
  }

  private async check(method: string, res: Response): Promise<void> {
    if (res.ok) return
    const body: unknown = await res.json().catch(() => null)
    const parsed = ApiErrorSchema.safeParse(body)
    throw new TelegramApiError(method, res.status, parsed.success ? parsed.data.description : res.statusText)
  }

  private async call(method: string, payload: object): Promise<void> {
    const res = await this.fetchImpl(this.url(method), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    })
    await this.check(method, res)
  }

  async sendMessage(chatId: string, text: string, choices?: WizardChoice[]): Promise<void> {
    const chunks = splitMessage(text)
    for (const [i, chunk] of chunks.entries()) {
      const isLast = i === chunks.length - 1
      await this.call('sendMessage', {
        chat_id: chatId,
        text: chunk,
        ...(isLast && choices?.length ? { reply_markup: inlineKeyboard(choices) } : {}),
      })
    }
  }

  async sendDocument(chatId: string, doc: BotDocument): Promise<void> {
    const form = new FormData()
    form.append('chat_id', chatId)
    form.append('document', new Blob([doc.content], { type: doc.mimeType }), doc.filename)
    if (doc.caption) form.append('caption', doc.caption)
    const res = await this.fetchImpl(this.url('sendDocument'), { method: 'POST', body: form })
    await this.check('sendDocument', res)
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId })
  }

  async sendReplies(chatId: string, replies: BotReply[]): Promise<void> {
    for (const reply of replies) {
      if (reply.document) {
        await this.sendDocument(chatId, reply.document)
        continue
      }
      await this.sendMessage(chatId, reply.text, reply.choices)
    }
  }
}
