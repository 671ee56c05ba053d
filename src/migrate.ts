/**
 * Database Migration Runner
 * Safe to run multiple times: every statement is IF NOT EXISTS.
 *
 * Usage: npm run migrate
 */
import 'dotenv/config'
import { closeDatabase, initDatabase, runMigrations } from './store/index.js'
import { errorMessage } from './utils/safe-log.js'

const dbUrl = process.env.DATABASE_URL
if (!dbUrl) {
    console.error('❌  DATABASE_URL not set in .env')
    process.exit(1)
}

console.log('🗄️  Connecting to database...')
initDatabase(dbUrl)

try {
    await runMigrations()
    console.log('✅  All migrations applied successfully')
} catch (err) {
    console.error('❌  Migration failed:', errorMessage(err))
    process.exitCode = 1
} finally {
    await closeDatabase()
}
