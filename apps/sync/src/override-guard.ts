/**
 * Manual-override protection
 * A manual translation is a human correction; sync never replaces it.
 */

import type { PhraseStore, Translation } from '@phrasesync/db'
import type { PhraseEntry } from './types.js'

export type MarkManualResult = { ok: true; translation: Translation } | { ok: false; error: 'not-found' }

export interface MarkManualSummary {
	marked: string[]
	notFound: string[]
}

export interface GuardPartition {
	manual: PhraseEntry[]
	toTranslate: PhraseEntry[]
}

export class OverrideGuard {
	constructor(
		private readonly store: PhraseStore,
		private readonly now: () => Date = () => new Date()
	) {}

	isManual(phraseKey: string, locale: string): Promise<boolean> {
		return this.store.isManual(phraseKey, locale)
	}

	/**
	 * Flip an existing translation to manual, keeping its value.
	 * Marking an already-manual translation again only refreshes its timestamp.
	 */
	async markManual(phraseKey: string, locale: string): Promise<MarkManualResult> {
		const existing = await this.store.getTranslation(phraseKey, locale)
		if (!existing) {
			return { ok: false, error: 'not-found' }
		}

		const translation: Translation = { ...existing, provenance: 'manual', lastUpdated: this.now() }
		await this.store.saveTranslation(translation)
		return { ok: true, translation }
	}

	async markManualMany(locale: string, phraseKeys: string[]): Promise<MarkManualSummary> {
		const summary: MarkManualSummary = { marked: [], notFound: [] }
		for (const phraseKey of phraseKeys) {
			const result = await this.markManual(phraseKey, locale)
			if (result.ok) {
				summary.marked.push(phraseKey)
			} else {
				summary.notFound.push(phraseKey)
			}
		}
		return summary
	}

	/**
	 * Split delta entries by the provenance of the locale's existing translations
	 * @param existing - Translations already loaded for the locale
	 */
	partition(entries: PhraseEntry[], existing: Map<string, Translation>): GuardPartition {
		const result: GuardPartition = { manual: [], toTranslate: [] }
		for (const entry of entries) {
			if (existing.get(entry.key)?.provenance === 'manual') {
				result.manual.push(entry)
			} else {
				result.toTranslate.push(entry)
			}
		}
		return result
	}
}
