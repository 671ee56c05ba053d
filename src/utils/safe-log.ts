/**
 * Safe error logging utility.
 * In production, strips stack traces and internal details so logs forwarded
 * to external sinks never carry query text or connection strings.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    return { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
