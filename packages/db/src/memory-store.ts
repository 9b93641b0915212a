import { groupByLocale } from './store.js'
import type { PhraseStore, SourcePhrase, Translation } from './types.js'

function byKey<T>(entries: Map<string, T>): Map<string, T> {
	return new Map([...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
}

/**
 * In-process phrase store with the same contract as PgPhraseStore.
 * Records are copied on the way in and out so callers cannot mutate stored state.
 */
export class MemoryPhraseStore implements PhraseStore {
	private readonly phrases = new Map<string, SourcePhrase>()
	private readonly translations = new Map<string, Map<string, Translation>>()

	async getAllSourcePhrases(): Promise<Map<string, SourcePhrase>> {
		const copy = new Map<string, SourcePhrase>()
		for (const [key, phrase] of byKey(this.phrases)) {
			copy.set(key, { ...phrase })
		}
		return copy
	}

	async saveSourcePhrases(phrases: SourcePhrase[]): Promise<void> {
		for (const phrase of phrases) {
			this.phrases.set(phrase.key, { ...phrase })
		}
	}

	async getTranslation(phraseKey: string, locale: string): Promise<Translation | null> {
		const translation = this.translations.get(locale)?.get(phraseKey)
		return translation ? { ...translation } : null
	}

	async isManual(phraseKey: string, locale: string): Promise<boolean> {
		return this.translations.get(locale)?.get(phraseKey)?.provenance === 'manual'
	}

	async saveTranslation(translation: Translation): Promise<void> {
		await this.saveTranslations([translation])
	}

	async saveTranslations(translations: Translation[]): Promise<void> {
		for (const [locale, group] of groupByLocale(translations)) {
			let table = this.translations.get(locale)
			if (!table) {
				table = new Map()
				this.translations.set(locale, table)
			}
			for (const t of group) {
				table.set(t.phraseKey, { ...t })
			}
		}
	}

	async getTranslationsForLocale(locale: string): Promise<Map<string, Translation>> {
		const copy = new Map<string, Translation>()
		const table = this.translations.get(locale)
		if (!table) return copy
		for (const [key, translation] of byKey(table)) {
			copy.set(key, { ...translation })
		}
		return copy
	}

	async listLocales(): Promise<string[]> {
		return [...this.translations.keys()].filter((locale) => (this.translations.get(locale)?.size ?? 0) > 0).sort()
	}

	async close(): Promise<void> {}
}
