/**
 * TypeScript type definitions for the phrase store
 */

/**
 * Who produced a translation. Manual translations are never overwritten by sync.
 */
export type Provenance = 'automatic' | 'manual'

/**
 * Canonical source-language phrase, one record per key
 */
export interface SourcePhrase {
	key: string
	value: string
	lastUpdated: Date
}

/**
 * Translation of one phrase into one locale
 */
export interface Translation {
	phraseKey: string
	locale: string
	value: string
	provenance: Provenance
	lastUpdated: Date
}

/**
 * Durable phrase and translation storage.
 * Every mutating call is committed before it resolves.
 * Implementations reject with StorageError on I/O failure.
 */
export interface PhraseStore {
	getAllSourcePhrases(): Promise<Map<string, SourcePhrase>>
	/** Upserts all phrases as one atomic unit */
	saveSourcePhrases(phrases: SourcePhrase[]): Promise<void>
	getTranslation(phraseKey: string, locale: string): Promise<Translation | null>
	isManual(phraseKey: string, locale: string): Promise<boolean>
	saveTranslation(translation: Translation): Promise<void>
	/** Groups by locale; each locale's rows commit as one atomic unit */
	saveTranslations(translations: Translation[]): Promise<void>
	/** Ordered by phrase key */
	getTranslationsForLocale(locale: string): Promise<Map<string, Translation>>
	listLocales(): Promise<string[]>
	close(): Promise<void>
}
