/**
 * Environment loader - import first, before anything that reads settings.
 *
 * Loads apps/retriever/.env.local outside production. Production injects
 * variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
