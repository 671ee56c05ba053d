/**
 * HTTP surface: Telegram webhook and health check.
 */

import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import { createHash, timingSafeEqual } from 'node:crypto'
import { parseTelegramUpdate } from './channels/telegram.js'
import type { TelegramClient } from './channels/telegram.js'
import type { ConversationService } from './conversation/service.js'
import { safeError } from './utils/safe-log.js'

export interface ServerDeps {
  conversation: ConversationService
  telegram: TelegramClient
  webhookSecret?: string
  logger?: boolean
}

function secretMatches(expected: string, incoming: string): boolean {
  // Hash both sides so timingSafeEqual always compares equal-length buffers
  const expectedDigest = createHash('sha256').update(expected).digest()
  const actualDigest = createHash('sha256').update(incoming).digest()
  return timingSafeEqual(expectedDigest, actualDigest)
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const server = Fastify({ logger: deps.logger ?? true })

  server.get('/health', async () => ({ status: 'ok' }))

  // ============================================
  // Telegram Webhook
  // ============================================

  server.post('/webhook/telegram', async (request, reply) => {
    if (deps.webhookSecret) {
      const header = request.headers['x-telegram-bot-api-secret-token']
      const incoming = Array.isArray(header) ? header[0] : header
      if (!incoming || !secretMatches(deps.webhookSecret, incoming)) {
        server.log.warn('Telegram webhook: invalid secret token')
        return reply.code(403).send({ ok: false, error: 'Forbidden' })
      }
    }

    const inbound = parseTelegramUpdate(request.body)
    if (!inbound) return { ok: true }

    if (inbound.callbackQueryId) {
      // Stops the button spinner; failure here shouldn't block the reply.
      await deps.telegram.answerCallbackQuery(inbound.callbackQueryId).catch(err => {
        server.log.warn({ err: safeError(err) }, 'answerCallbackQuery failed')
      })
    }

    const replies = await deps.conversation.handle(inbound.event)
    try {
      await deps.telegram.sendReplies(inbound.chatId, replies)
    } catch (err) {
      server.log.error({ err: safeError(err) }, `Failed to deliver replies to chat ${inbound.chatId}`)
      return { ok: false }
    }
    return { ok: true }
  })

  return server
}
