/**
 * TypeScript type definitions for the phrase sync engine
 */

/**
 * One phrase key with its text in some language
 */
export interface PhraseEntry {
	key: string
	value: string
}

/**
 * Outcome of one oracle call. Anything that is not `ok` fails the chunk;
 * only `rate-limited` is retried.
 */
export type OracleResult =
	| { status: 'ok'; texts: string[] }
	| { status: 'rate-limited'; detail: string }
	| { status: 'failed'; detail: string }

/**
 * External translation service, treated as an order-preserving 1:1 batch function
 */
export type TranslationOracle = (fromLocale: string, toLocale: string, texts: string[]) => Promise<OracleResult>

export type Sleep = (ms: number) => Promise<void>

export interface BatchOptions {
	batchSize?: number // Max entries per oracle call (default: 100)
	maxRetries?: number // Total attempts for a rate-limited chunk (default: 3)
	backoffBaseMs?: number // Wait after the first rate-limited attempt, doubled after each (default: 10s)
	batchPauseMs?: number // Pause between successful chunks (default: 3s)
	sleep?: Sleep
	/** Called with each successful chunk before the next starts; rejections propagate */
	onChunkTranslated?: (entries: PhraseEntry[]) => Promise<void>
}

export interface BatchResult {
	merged: Map<string, string>
	failedKeys: string[]
	chunkCount: number
}

export type SyncPhase = 'init' | 'diffing' | 'no-changes' | 'translating' | 'merging' | 'done'

export interface LocaleReport {
	locale: string
	translated: number // Keys newly written as automatic translations
	failedKeys: string[] // Keys left for the next run to retry
	skippedManual: string[] // Keys protected by a manual translation
	passThroughKeys: string[] // Translated keys whose value equals the source text
	bundleSize: number // Entries in the exported bundle
	error?: string // Store failure that cut the locale short
}

export interface SyncReport {
	outcome: 'no-changes' | 'completed'
	diffed: number // Keys in the delta
	locales: LocaleReport[]
}
