/**
 * Translation quality checks
 * Flags likely pass-through results; flags never block a sync
 */

import type { SourcePhrase, Translation } from '@phrasesync/db'
import type { PhraseEntry } from './types.js'

const HAS_LETTER = /\p{L}/u

export type IssueKind = 'missing' | 'empty' | 'untranslated'

export interface TranslationIssue {
	key: string
	kind: IssueKind
	value?: string
}

/**
 * True when the translator returned the source text unchanged.
 * Text without letters (numbers, symbols, placeholders) is expected to pass through.
 */
export function isPassThrough(source: string, translated: string): boolean {
	return translated === source && HAS_LETTER.test(source)
}

/**
 * Keys of translated entries whose value equals the source text
 */
export function findPassThrough(sources: Map<string, string>, translated: PhraseEntry[]): string[] {
	const keys: string[] = []
	for (const entry of translated) {
		const source = sources.get(entry.key)
		if (source !== undefined && isPassThrough(source, entry.value)) {
			keys.push(entry.key)
		}
	}
	return keys
}

/**
 * Compare one locale's stored translations against the recorded source phrases
 * Manual translations are trusted as-is, even when they equal the source
 */
export function auditTranslations(
	sourcePhrases: Map<string, SourcePhrase>,
	translations: Map<string, Translation>
): TranslationIssue[] {
	const issues: TranslationIssue[] = []

	for (const [key, phrase] of sourcePhrases) {
		const translation = translations.get(key)
		if (!translation) {
			issues.push({ key, kind: 'missing' })
			continue
		}
		if (translation.value.trim() === '' && phrase.value.trim() !== '') {
			issues.push({ key, kind: 'empty', value: translation.value })
			continue
		}
		if (translation.provenance === 'automatic' && isPassThrough(phrase.value, translation.value)) {
			issues.push({ key, kind: 'untranslated', value: translation.value })
		}
	}

	return issues
}
