/**
 * Source phrase queries
 * Batch operations to minimize SQL round trips
 */

import type { QueryRunner } from './database.js'
import type { SourcePhrase } from './types.js'

interface SourcePhraseRow {
	phrase_key: string
	value: string
	updated_at: Date
}

/**
 * Load every recorded source phrase
 *
 * SQL: 1 query
 */
export async function selectSourcePhrases(db: QueryRunner): Promise<Map<string, SourcePhrase>> {
	const rows = await db.query<SourcePhraseRow>(
		`SELECT phrase_key, value, updated_at
		FROM source_phrase
		ORDER BY phrase_key COLLATE "C"`
	)

	const phrases = new Map<string, SourcePhrase>()
	for (const row of rows) {
		phrases.set(row.phrase_key, {
			key: row.phrase_key,
			value: row.value,
			lastUpdated: row.updated_at,
		})
	}
	return phrases
}

/**
 * Batch insert/update source phrases
 * Uses INSERT ... ON CONFLICT DO UPDATE with UNNEST
 *
 * SQL: 1 query
 */
export async function upsertSourcePhrases(db: QueryRunner, phrases: SourcePhrase[]): Promise<void> {
	if (phrases.length === 0) {
		return
	}

	// Deduplicate by key (last one wins); ON CONFLICT cannot touch a row twice
	const unique = new Map<string, SourcePhrase>()
	for (const phrase of phrases) {
		unique.set(phrase.key, phrase)
	}
	const rows = Array.from(unique.values())

	await db.query(
		`INSERT INTO source_phrase (phrase_key, value, updated_at)
		SELECT unnest($1::text[]), unnest($2::text[]), unnest($3::timestamptz[])
		ON CONFLICT (phrase_key)
		DO UPDATE SET
			value = EXCLUDED.value,
			updated_at = EXCLUDED.updated_at`,
		[rows.map((p) => p.key), rows.map((p) => p.value), rows.map((p) => p.lastUpdated)]
	)
}
