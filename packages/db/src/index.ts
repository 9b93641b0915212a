/**
 * Phrase store module re-exports
 */

export { pool, closePool } from './pool.js'
export { createDatabase, type Database, type QueryRunner } from './database.js'
export { ensureSchema } from './schema.js'
export { StorageError } from './errors.js'
export { PgPhraseStore, groupByLocale } from './store.js'
export { MemoryPhraseStore } from './memory-store.js'
export type { PhraseStore, Provenance, SourcePhrase, Translation } from './types.js'
