/**
 * Sync orchestration
 * init -> diffing -> (no-changes | translating) -> merging -> done
 *
 * Locales run one after another. Source phrases are committed once, before any
 * locale, and each translated chunk is committed as soon as it returns.
 */

import { StorageError, type PhraseStore, type Translation } from '@phrasesync/db'
import { toBundleEntries, type BundleSink } from './bundle/files.js'
import { computeDelta } from './diff.js'
import { OverrideGuard } from './override-guard.js'
import { findPassThrough } from './quality.js'
import { translateBatches } from './translation/batch-translator.js'
import type {
	BatchOptions,
	LocaleReport,
	PhraseEntry,
	SyncPhase,
	SyncReport,
	TranslationOracle,
} from './types.js'

export interface SyncOptions {
	store: PhraseStore
	oracle: TranslationOracle
	phrases: Map<string, string> // Incoming source catalog, in catalog order
	sourceLocale: string
	targetLocales: string[]
	force?: boolean // Re-translate every incoming phrase
	retry?: Map<string, string[]> // Per-locale keys that failed in an earlier run
	/** Target locales left out of this run; the delta is added to their failure artifacts */
	deferredLocales?: string[]
	batch?: Omit<BatchOptions, 'onChunkTranslated'>
	sink?: BundleSink
	now?: () => Date
	onPhase?: (phase: SyncPhase, locale?: string) => void
}

interface LocaleContext {
	store: PhraseStore
	oracle: TranslationOracle
	guard: OverrideGuard
	phrases: Map<string, string>
	sourceLocale: string
	batch: Omit<BatchOptions, 'onChunkTranslated'>
	sink?: BundleSink
	now: () => Date
	onPhase: (phase: SyncPhase, locale?: string) => void
}

/**
 * Delta entries plus earlier failures still present in the catalog
 */
function localeWork(delta: PhraseEntry[], phrases: Map<string, string>, retryKeys: string[] = []): PhraseEntry[] {
	const work = [...delta]
	const seen = new Set(delta.map((entry) => entry.key))
	for (const key of retryKeys) {
		const value = phrases.get(key)
		if (value === undefined || seen.has(key)) continue
		seen.add(key)
		work.push({ key, value })
	}
	return work
}

/**
 * Record the delta as pending for locales outside this run. Runs before the
 * delta is committed, since afterwards those keys no longer show up as changed.
 */
async function deferLocales(
	sink: BundleSink,
	locales: string[],
	delta: PhraseEntry[],
	retry: Map<string, string[]>
): Promise<void> {
	for (const locale of locales) {
		const keys = [...new Set([...(retry.get(locale) ?? []), ...delta.map((entry) => entry.key)])]
		try {
			await sink.writeFailures(locale, keys)
		} catch (error) {
			throw new StorageError(`defer keys (${locale})`, error)
		}
		console.log(`[Sync] ${locale}: ${keys.length} keys left for a later run`)
	}
}

async function writeArtifacts(sink: BundleSink, locale: string, bundle: Map<string, string>, failedKeys: string[]) {
	try {
		await sink.writeBundle(locale, bundle)
		await sink.writeFailures(locale, failedKeys)
	} catch (error) {
		throw new StorageError(`write bundle (${locale})`, error)
	}
}

async function syncLocale(ctx: LocaleContext, locale: string, work: PhraseEntry[]): Promise<LocaleReport> {
	const report: LocaleReport = {
		locale,
		translated: 0,
		failedKeys: [],
		skippedManual: [],
		passThroughKeys: [],
		bundleSize: 0,
	}
	let pending = work
	const persisted = new Set<string>()

	try {
		ctx.onPhase('translating', locale)
		const existing = await ctx.store.getTranslationsForLocale(locale)
		const { manual, toTranslate } = ctx.guard.partition(work, existing)
		report.skippedManual = manual.map((entry) => entry.key)
		pending = toTranslate

		console.log(
			`[Sync] ${locale}: ${toTranslate.length} to translate` +
				(manual.length > 0 ? `, ${manual.length} kept manual` : '')
		)

		const result = await translateBatches(ctx.oracle, ctx.sourceLocale, locale, toTranslate, {
			...ctx.batch,
			onChunkTranslated: async (entries) => {
				const lastUpdated = ctx.now()
				const translations: Translation[] = entries.map((entry) => ({
					phraseKey: entry.key,
					locale,
					value: entry.value,
					provenance: 'automatic',
					lastUpdated,
				}))
				await ctx.store.saveTranslations(translations)
				for (const entry of entries) persisted.add(entry.key)
				report.translated += entries.length
				report.passThroughKeys.push(...findPassThrough(ctx.phrases, entries))
			},
		})
		report.failedKeys = result.failedKeys

		// The bundle is the full stored state of the locale, not just this run's delta
		ctx.onPhase('merging', locale)
		const bundle = toBundleEntries(await ctx.store.getTranslationsForLocale(locale))
		report.bundleSize = bundle.size
		if (ctx.sink) {
			await writeArtifacts(ctx.sink, locale, bundle, report.failedKeys)
		}
	} catch (error) {
		if (!(error instanceof StorageError)) throw error
		console.error(`[Sync] ${locale}: aborted, continuing with next locale:`, error)
		report.error = error.message
		report.failedKeys = pending.filter((entry) => !persisted.has(entry.key)).map((entry) => entry.key)
		return report
	}

	if (report.failedKeys.length > 0) {
		console.warn(`[Sync] ${locale}: ${report.failedKeys.length} failed`)
	}
	return report
}

/**
 * Bring every target locale up to date with the incoming source phrases
 *
 * @throws StorageError if recorded phrases cannot be read or the delta cannot be
 * committed; nothing has been translated at that point
 */
export async function syncTranslations(options: SyncOptions): Promise<SyncReport> {
	const {
		store,
		oracle,
		phrases,
		sourceLocale,
		targetLocales,
		force = false,
		retry = new Map<string, string[]>(),
		deferredLocales = [],
		batch = {},
		sink,
		now = () => new Date(),
		onPhase = () => {},
	} = options

	if (deferredLocales.length > 0 && !sink) {
		throw new RangeError('Deferred locales need a bundle sink to record their pending keys')
	}

	onPhase('init')
	const stored = await store.getAllSourcePhrases()

	onPhase('diffing')
	const delta = computeDelta(phrases, stored, { forceAll: force })
	const work = new Map(targetLocales.map((locale) => [locale, localeWork(delta, phrases, retry.get(locale))]))
	const hasRetries = [...work.values()].some((entries) => entries.length > delta.length)

	if (delta.length === 0 && !force && !hasRetries) {
		console.log('[Sync] No changes detected, all phrases are up to date')
		onPhase('no-changes')
		onPhase('done')
		return { outcome: 'no-changes', diffed: 0, locales: [] }
	}

	console.log(`[Sync] ${delta.length} phrases need translation`)
	if (sink && delta.length > 0) {
		await deferLocales(sink, deferredLocales, delta, retry)
	}

	const lastUpdated = now()
	await store.saveSourcePhrases(delta.map((entry) => ({ key: entry.key, value: entry.value, lastUpdated })))

	const ctx: LocaleContext = {
		store,
		oracle,
		guard: new OverrideGuard(store, now),
		phrases,
		sourceLocale,
		batch,
		sink,
		now,
		onPhase,
	}

	const locales: LocaleReport[] = []
	for (const locale of targetLocales) {
		locales.push(await syncLocale(ctx, locale, work.get(locale) ?? delta))
	}

	onPhase('done')
	return { outcome: 'completed', diffed: delta.length, locales }
}
