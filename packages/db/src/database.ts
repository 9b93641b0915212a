/**
 * Minimal query surface over the pg pool
 * Lets the store run statements inside a single transaction
 */

import type { Pool, QueryResultRow } from 'pg'
import { pool as sharedPool } from './pool.js'

export interface QueryRunner {
	query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>
}

export interface Database extends QueryRunner {
	/**
	 * Run `work` between BEGIN and COMMIT on one pooled connection.
	 * Rolls back and rethrows if `work` rejects.
	 */
	transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T>
}

/**
 * Wrap a pg pool (the shared lazy pool by default)
 */
export function createDatabase(pgPool: Pool = sharedPool): Database {
	return {
		async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]> {
			const result = await pgPool.query<R>(text, values)
			return result.rows
		},

		async transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T> {
			const client = await pgPool.connect()
			const tx: QueryRunner = {
				async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<R[]> {
					const result = await client.query<R>(text, values)
					return result.rows
				},
			}

			try {
				await client.query('BEGIN')
				const result = await work(tx)
				await client.query('COMMIT')
				return result
			} catch (error) {
				try {
					await client.query('ROLLBACK')
				} catch (rollbackError) {
					console.error('[Store] ROLLBACK failed:', rollbackError)
				}
				throw error
			} finally {
				client.release()
			}
		},
	}
}
