/**
 * PostgreSQL connection pool
 * Backs the phrase store with persistent database storage
 */

import { Pool } from 'pg'

// Lazy pool initialization to ensure env vars are loaded first
let _pool: Pool | null = null

function getPool(): Pool {
	if (!_pool) {
		const connectionString = process.env.POSTGRES_DB_URL
		_pool = new Pool({
			connectionString,
			max: 5, // One writer per run; a handful covers reads alongside it
			idleTimeoutMillis: 30000, // Close idle connections after 30s
			connectionTimeoutMillis: 10000, // Connection timeout
			ssl: connectionString?.includes('sslmode=require') ? { rejectUnauthorized: false } : false,
		})
	}
	return _pool
}

// Export pool as a Proxy that lazily initializes the real pool
// This ensures env vars are loaded before pool creation
export const pool: Pool = new Proxy({} as Pool, {
	get(_, prop: keyof Pool) {
		const realPool = getPool()
		const value = realPool[prop]
		if (typeof value === 'function') {
			return value.bind(realPool)
		}
		return value
	},
})

/**
 * Graceful shutdown - close all connections
 */
export async function closePool(): Promise<void> {
	if (_pool) {
		await _pool.end()
		_pool = null
	}
}
