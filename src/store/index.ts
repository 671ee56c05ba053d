import type { AppConfig } from '../config.js'
import { InMemoryFunnelStore } from './memory-store.js'
import { PgFunnelStore } from './pg-store.js'
import { initDatabase } from './pool.js'
import type { FunnelStore } from './types.js'

export type * from './types.js'
export { WeekFunnelMismatchError } from './types.js'
export { InMemoryFunnelStore } from './memory-store.js'
export { PgFunnelStore, runMigrations } from './pg-store.js'
export { closeDatabase, initDatabase } from './pool.js'

export function createStore(config: AppConfig['store']): FunnelStore {
  if (config.kind === 'memory') {
    console.warn('[Store] Using in-memory store; data is lost on restart')
    return new InMemoryFunnelStore()
  }
  initDatabase(config.databaseUrl)
  return new PgFunnelStore()
}
