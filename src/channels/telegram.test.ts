import { describe, it, expect, vi } from 'vitest'
import { parseTelegramUpdate, splitMessage, TelegramApiError, TelegramClient } from './telegram.js'

function okResponse(): Response {
  return new Response(JSON.stringify({ ok: true, result: true }), { status: 200 })
}

function fakeFetch(respond: () => Response = okResponse) {
  return vi.fn(async (..._args: Parameters<typeof fetch>) => respond())
}

function jsonBody(call: Parameters<typeof fetch>): unknown {
  return JSON.parse(String(call[1]?.body))
}

describe('parseTelegramUpdate', () => {
  it('turns a text message into a text event', () => {
    const inbound = parseTelegramUpdate({
      update_id: 1,
      message: { chat: { id: 42 }, from: { id: 7, username: 'test_user' }, text: '/start' },
    })
    expect(inbound).toEqual({
      chatId: '42',
      event: { kind: 'text', userId: '7', username: 'test_user', text: '/start' },
    })
  })

  it('turns a button tap into an action event', () => {
    const inbound = parseTelegramUpdate({
      update_id: 2,
      callback_query: { id: 'cb-1', from: { id: 7 }, data: 'wiz:skip', message: { chat: { id: 42 } } },
    })
    expect(inbound).toEqual({
      chatId: '42',
      callbackQueryId: 'cb-1',
      event: { kind: 'action', userId: '7', username: null, action: 'wiz:skip' },
    })
  })

  it('ignores updates without text and malformed bodies', () => {
    expect(parseTelegramUpdate({ update_id: 3, message: { chat: { id: 42 }, from: { id: 7 } } })).toBeNull()
    expect(parseTelegramUpdate({ hello: 'world' })).toBeNull()
    expect(parseTelegramUpdate(null)).toBeNull()
  })
})

describe('splitMessage', () => {
  it('keeps short text whole', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello'])
  })

  it('splits on line boundaries', () => {
    expect(splitMessage('aaa\nbbb\nccc', 7)).toEqual(['aaa\nbbb', 'ccc'])
  })

  it('hard-splits a single line longer than the limit', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij'])
  })
})

describe('TelegramClient', () => {
  it('attaches the keyboard to the last chunk only', async () => {
    const fetchImpl = fakeFetch()
    const client = new TelegramClient('test-token', fetchImpl)

    await client.sendMessage('42', `${'a'.repeat(3000)}\n${'b'.repeat(3000)}`, [{ label: 'Menu', action: 'menu' }])

    expect(fetchImpl).toHaveBeenCalledTimes(2)
    expect(fetchImpl.mock.calls[0][0]).toBe('https://api.telegram.org/bottest-token/sendMessage')
    expect(jsonBody(fetchImpl.mock.calls[0])).toEqual({ chat_id: '42', text: 'a'.repeat(3000) })
    expect(jsonBody(fetchImpl.mock.calls[1])).toEqual({
      chat_id: '42',
      text: 'b'.repeat(3000),
      reply_markup: { inline_keyboard: [[{ text: 'Menu', callback_data: 'menu' }]] },
    })
  })

  it('raises the API description on failure', async () => {
    const fetchImpl = fakeFetch(() => new Response(
      JSON.stringify({ ok: false, description: 'Forbidden: bot was blocked by the user' }),
      { status: 403 },
    ))
    const client = new TelegramClient('test-token', fetchImpl)

    const error = await client.sendMessage('42', 'hi').catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TelegramApiError)
    expect(error instanceof Error && error.message).toBe('Telegram sendMessage failed (403): Forbidden: bot was blocked by the user')
  })

  it('uploads documents as multipart form data', async () => {
    const fetchImpl = fakeFetch()
    const client = new TelegramClient('test-token', fetchImpl)

    await client.sendReplies('42', [{
      text: 'Export',
      document: { filename: 'funnel-active-2025-01-08.csv', content: 'Week;Channel\r\n', mimeType: 'text/csv', caption: 'Export' },
    }])

    expect(fetchImpl).toHaveBeenCalledTimes(1)
    const [url, init] = fetchImpl.mock.calls[0]
    expect(url).toBe('https://api.telegram.org/bottest-token/sendDocument')
    const form = init?.body
    expect(form).toBeInstanceOf(FormData)
    if (form instanceof FormData) {
      expect(form.get('chat_id')).toBe('42')
      expect(form.get('caption')).toBe('Export')
    }
  })
})
