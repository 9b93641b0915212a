/**
 * Schema bootstrap
 * Applies schema.sql, which only uses IF NOT EXISTS statements
 */

import { readFile } from 'node:fs/promises'
import type { Database } from './database.js'
import { StorageError } from './errors.js'

const SCHEMA_URL = new URL('../schema.sql', import.meta.url)

export async function ensureSchema(db: Database): Promise<void> {
	try {
		const sql = await readFile(SCHEMA_URL, 'utf8')
		await db.transaction(async (tx) => {
			await tx.query(sql)
		})
	} catch (error) {
		throw new StorageError('schema setup', error)
	}
}
