/**
 * Translation queries
 * Rows are scoped by locale; writes for one locale go in one statement
 */

import type { QueryRunner } from './database.js'
import type { Provenance, Translation } from './types.js'

interface TranslationRow {
	phrase_key: string
	locale: string
	value: string
	provenance: Provenance
	updated_at: Date
}

function toTranslation(row: TranslationRow): Translation {
	return {
		phraseKey: row.phrase_key,
		locale: row.locale,
		value: row.value,
		provenance: row.provenance,
		lastUpdated: row.updated_at,
	}
}

/**
 * SQL: 1 query on the (locale, phrase_key) primary key
 */
export async function selectTranslation(
	db: QueryRunner,
	phraseKey: string,
	locale: string
): Promise<Translation | null> {
	const rows = await db.query<TranslationRow>(
		`SELECT phrase_key, locale, value, provenance, updated_at
		FROM phrase_translation
		WHERE locale = $1 AND phrase_key = $2`,
		[locale, phraseKey]
	)
	return rows.length > 0 ? toTranslation(rows[0]) : null
}

/**
 * Load all translations for one locale, ordered by phrase key
 *
 * SQL: 1 query
 */
export async function selectLocaleTranslations(db: QueryRunner, locale: string): Promise<Map<string, Translation>> {
	const rows = await db.query<TranslationRow>(
		`SELECT phrase_key, locale, value, provenance, updated_at
		FROM phrase_translation
		WHERE locale = $1
		ORDER BY phrase_key COLLATE "C"`,
		[locale]
	)

	const translations = new Map<string, Translation>()
	for (const row of rows) {
		translations.set(row.phrase_key, toTranslation(row))
	}
	return translations
}

/**
 * Locales holding at least one translation
 */
export async function selectLocales(db: QueryRunner): Promise<string[]> {
	const rows = await db.query<{ locale: string }>(
		`SELECT DISTINCT locale FROM phrase_translation ORDER BY locale`
	)
	return rows.map((row) => row.locale)
}

/**
 * Batch insert/update translations of a single locale
 *
 * @param locale - Locale every row is written under
 * @param translations - Rows to write; later rows for the same key win
 *
 * SQL: 1 query with UNNEST
 */
export async function upsertLocaleTranslations(
	db: QueryRunner,
	locale: string,
	translations: Translation[]
): Promise<void> {
	if (translations.length === 0) {
		return
	}

	const unique = new Map<string, Translation>()
	for (const t of translations) {
		unique.set(t.phraseKey, t)
	}

	// Prepare parallel arrays for UNNEST
	const keys: string[] = []
	const values: string[] = []
	const provenances: Provenance[] = []
	const timestamps: Date[] = []

	for (const t of unique.values()) {
		keys.push(t.phraseKey)
		values.push(t.value)
		provenances.push(t.provenance)
		timestamps.push(t.lastUpdated)
	}

	await db.query(
		`INSERT INTO phrase_translation (locale, phrase_key, value, provenance, updated_at)
		SELECT $1, unnest($2::text[]), unnest($3::text[]), unnest($4::text[]), unnest($5::timestamptz[])
		ON CONFLICT (locale, phrase_key)
		DO UPDATE SET
			value = EXCLUDED.value,
			provenance = EXCLUDED.provenance,
			updated_at = EXCLUDED.updated_at`,
		[locale, keys, values, provenances, timestamps]
	)
}
