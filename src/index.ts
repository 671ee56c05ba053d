/**
 * Funnel Coach - Main Server
 * Telegram webhook, conversation service and reminder scheduler in one process.
 */

import 'dotenv/config'
import { TelegramClient } from './channels/telegram.js'
import { loadConfig } from './config.js'
import type { AppConfig } from './config.js'
import { ConversationService } from './conversation/service.js'
import { ReminderScheduler } from './reminders/scheduler.js'
import { buildServer } from './server.js'
import { closeDatabase, createStore } from './store/index.js'
import { errorMessage, safeError } from './utils/safe-log.js'

let config: AppConfig
try {
  config = loadConfig()
} catch (err) {
  console.error('❌ ', errorMessage(err))
  process.exit(1)
}

if (!config.telegram.botToken) {
  console.warn('[Telegram] TELEGRAM_BOT_TOKEN is not set; replies will fail to send')
}

const store = createStore(config.store)
const telegram = new TelegramClient(config.telegram.botToken)
const conversation = new ConversationService({
  store,
  channelDeletePolicy: config.channelDeletePolicy,
  defaultTimezone: config.reminders.timezone,
})
const scheduler = new ReminderScheduler({
  store,
  defaults: config.reminders,
  send: (userId, text, choices) => telegram.sendMessage(userId, text, choices),
})
const server = buildServer({
  conversation,
  telegram,
  webhookSecret: config.telegram.webhookSecret,
})

async function shutdown(signal: string): Promise<void> {
  console.log(`[Server] ${signal} received, shutting down`)
  scheduler.stop()
  await server.close()
  await store.close()
  if (config.store.kind === 'postgres') await closeDatabase()
  process.exit(0)
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch(err => {
      console.error('[Server] Shutdown failed:', safeError(err))
      process.exit(1)
    })
  })
}

try {
  await store.init()
  await scheduler.start()
  await server.listen({ port: config.port, host: '0.0.0.0' })
  console.log(`[Server] Listening on :${config.port} (store=${config.store.kind})`)
} catch (err) {
  console.error('[Server] Startup failed:', safeError(err))
  process.exit(1)
}
