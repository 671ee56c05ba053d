/**
 * Postgres pool for the funnel store. Initialize once with DATABASE_URL.
 */

import { Pool } from 'pg'
import type { PoolClient } from 'pg'
import { errorMessage } from '../utils/safe-log.js'

let pool: Pool | null = null

export function initDatabase(databaseUrl: string): void {
  // Strip sslmode from URL; SSL is configured explicitly below.
  const cleanUrl = databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

  pool = new Pool({
    connectionString: cleanUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    ssl: process.env.NODE_ENV === 'production'
      ? {
        ca: process.env.DATABASE_CA_CERT
          ? Buffer.from(process.env.DATABASE_CA_CERT, 'base64').toString()
          : undefined,
        rejectUnauthorized: !!process.env.DATABASE_CA_CERT,
      }
      : false,
  })
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

/** Run `fn` inside BEGIN/COMMIT on one pooled client; ROLLBACK and rethrow on failure. */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect()
  try {
    await client.query('BEGIN')
    const result = await fn(client)
    await client.query('COMMIT')
    return result
  } catch (err) {
    await client.query('ROLLBACK').catch(rollbackErr => {
      console.error('[DB] Rollback failed:', errorMessage(rollbackErr))
    })
    throw err
  } finally {
    client.release()
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}
