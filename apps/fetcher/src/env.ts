/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/fetcher/.env.local in development. Scheduled production runs get
 * their variables from the invoking environment.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(dirname(fileURLToPath(import.meta.url)), '..', '.env.local')
  config({ path: envPath })
}
