/**
 * PostgreSQL-backed phrase store
 * Every failure surfaces as StorageError
 */

import { createDatabase, type Database } from './database.js'
import { StorageError } from './errors.js'
import { closePool } from './pool.js'
import { selectSourcePhrases, upsertSourcePhrases } from './source-phrases.js'
import {
	selectLocales,
	selectLocaleTranslations,
	selectTranslation,
	upsertLocaleTranslations,
} from './translations.js'
import type { PhraseStore, SourcePhrase, Translation } from './types.js'

/**
 * Group translations by locale, keeping first-seen locale order
 */
export function groupByLocale(translations: Translation[]): Map<string, Translation[]> {
	const byLocale = new Map<string, Translation[]>()
	for (const t of translations) {
		const group = byLocale.get(t.locale)
		if (group) {
			group.push(t)
		} else {
			byLocale.set(t.locale, [t])
		}
	}
	return byLocale
}

export class PgPhraseStore implements PhraseStore {
	constructor(
		private readonly db: Database = createDatabase(),
		private readonly onClose: () => Promise<void> = closePool
	) {}

	private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
		try {
			return await work()
		} catch (error) {
			if (error instanceof StorageError) throw error
			console.error(`[Store] ${operation} failed:`, error)
			throw new StorageError(operation, error)
		}
	}

	getAllSourcePhrases(): Promise<Map<string, SourcePhrase>> {
		return this.run('read source phrases', () => selectSourcePhrases(this.db))
	}

	saveSourcePhrases(phrases: SourcePhrase[]): Promise<void> {
		if (phrases.length === 0) return Promise.resolve()
		return this.run('save source phrases', () => this.db.transaction((tx) => upsertSourcePhrases(tx, phrases)))
	}

	getTranslation(phraseKey: string, locale: string): Promise<Translation | null> {
		return this.run('read translation', () => selectTranslation(this.db, phraseKey, locale))
	}

	async isManual(phraseKey: string, locale: string): Promise<boolean> {
		const translation = await this.getTranslation(phraseKey, locale)
		return translation?.provenance === 'manual'
	}

	saveTranslation(translation: Translation): Promise<void> {
		return this.saveTranslations([translation])
	}

	async saveTranslations(translations: Translation[]): Promise<void> {
		// One transaction per locale; an earlier locale stays committed if a later one fails
		for (const [locale, group] of groupByLocale(translations)) {
			await this.run(`save translations (${locale})`, () =>
				this.db.transaction((tx) => upsertLocaleTranslations(tx, locale, group))
			)
		}
	}

	getTranslationsForLocale(locale: string): Promise<Map<string, Translation>> {
		return this.run(`read translations (${locale})`, () => selectLocaleTranslations(this.db, locale))
	}

	listLocales(): Promise<string[]> {
		return this.run('list locales', () => selectLocales(this.db))
	}

	close(): Promise<void> {
		return this.onClose()
	}
}
