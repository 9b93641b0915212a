/**
 * Bundle files on disk
 * Export writes one bundle per locale; import seeds the store from existing bundles
 */

import { existsSync } from 'node:fs'
import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { PhraseStore, Translation } from '@phrasesync/db'
import { BundleError } from '../errors.js'
import {
	bundleFileName,
	decodeBundle,
	decodeFailures,
	encodeBundle,
	encodeFailures,
	failureFileName,
	localeFromFileName,
} from './codec.js'

/**
 * Destination for locale bundles and per-locale failure artifacts
 */
export interface BundleSink {
	writeBundle(locale: string, entries: Map<string, string>): Promise<void>
	/** An empty list clears any previous failure artifact */
	writeFailures(locale: string, keys: string[]): Promise<void>
}

export class FileBundleSink implements BundleSink {
	constructor(private readonly outputDir: string) {}

	async writeBundle(locale: string, entries: Map<string, string>): Promise<void> {
		await mkdir(this.outputDir, { recursive: true })
		await writeFile(join(this.outputDir, bundleFileName(locale)), encodeBundle(locale, entries), 'utf8')
	}

	async writeFailures(locale: string, keys: string[]): Promise<void> {
		const file = join(this.outputDir, failureFileName(locale))
		if (keys.length === 0) {
			await rm(file, { force: true })
			return
		}
		await mkdir(this.outputDir, { recursive: true })
		await writeFile(file, encodeFailures(keys), 'utf8')
	}
}

/**
 * Flatten stored translations into bundle entries
 */
export function toBundleEntries(translations: Map<string, Translation>): Map<string, string> {
	const entries = new Map<string, string>()
	for (const [key, translation] of translations) {
		entries.set(key, translation.value)
	}
	return entries
}

export interface ExportSummary {
	exported: { locale: string; count: number }[]
	skipped: string[] // Locales with no stored translations
}

/**
 * Write the full stored state of each locale as a bundle
 */
export async function exportBundles(store: PhraseStore, locales: string[], sink: BundleSink): Promise<ExportSummary> {
	const summary: ExportSummary = { exported: [], skipped: [] }

	for (const locale of locales) {
		const translations = await store.getTranslationsForLocale(locale)
		if (translations.size === 0) {
			console.log(`[Bundle] Skipping ${locale} (no translations in store)`)
			summary.skipped.push(locale)
			continue
		}

		await sink.writeBundle(locale, toBundleEntries(translations))
		console.log(`[Bundle] Exported ${locale}: ${translations.size} translations`)
		summary.exported.push({ locale, count: translations.size })
	}

	return summary
}

export interface ImportOptions {
	sourceLocale?: string // Its bundle seeds the source phrases instead of translations
	now?: () => Date
}

export interface ImportSummary {
	sourcePhrases: number // Source phrases recorded from the source-locale bundle
	imported: { locale: string; count: number }[]
	keptManual: number // Entries skipped because the stored translation is manual
	failedFiles: { file: string; reason: string }[]
}

/**
 * Store every `app_<locale>.arb` in a directory as automatic translations.
 * The source-locale bundle is recorded as the source phrases, so a sync right
 * after an import finds nothing changed. Existing manual translations are left
 * as they are. Malformed files are reported and skipped; store failures propagate.
 */
export async function importBundles(
	inputDir: string,
	store: PhraseStore,
	options: ImportOptions = {}
): Promise<ImportSummary> {
	const { sourceLocale, now = () => new Date() } = options
	const summary: ImportSummary = { sourcePhrases: 0, imported: [], keptManual: 0, failedFiles: [] }
	const files = (await readdir(inputDir)).sort()
	let sawSource = false

	for (const file of files) {
		const locale = localeFromFileName(file)
		if (!locale) continue

		let entries: Map<string, string>
		try {
			entries = decodeBundle(await readFile(join(inputDir, file), 'utf8'))
		} catch (error) {
			if (!(error instanceof BundleError)) throw error
			console.error(`[Bundle] Skipping ${file}: ${error.message}`)
			summary.failedFiles.push({ file, reason: error.message })
			continue
		}

		const lastUpdated = now()

		if (locale === sourceLocale) {
			sawSource = true
			await store.saveSourcePhrases([...entries].map(([key, value]) => ({ key, value, lastUpdated })))
			console.log(`[Bundle] Recorded ${entries.size} source phrases from ${file}`)
			summary.sourcePhrases = entries.size
			continue
		}

		const existing = await store.getTranslationsForLocale(locale)
		const translations: Translation[] = []
		for (const [phraseKey, value] of entries) {
			if (existing.get(phraseKey)?.provenance === 'manual') {
				summary.keptManual++
				continue
			}
			translations.push({ phraseKey, locale, value, provenance: 'automatic', lastUpdated })
		}

		await store.saveTranslations(translations)
		console.log(`[Bundle] Imported ${locale}: ${translations.length} translations`)
		summary.imported.push({ locale, count: translations.length })
	}

	if (sourceLocale && !sawSource) {
		console.warn(`[Bundle] No ${bundleFileName(sourceLocale)} in ${inputDir}; source phrases not recorded`)
	}

	return summary
}

/**
 * Keys left over from earlier runs, read from the failure artifacts in a directory.
 * Locales without an artifact are absent; unreadable artifacts are logged and ignored.
 */
export async function readFailures(outputDir: string, locales: string[]): Promise<Map<string, string[]>> {
	const failures = new Map<string, string[]>()
	if (!existsSync(outputDir)) return failures

	const files = new Set(await readdir(outputDir))
	for (const locale of locales) {
		const file = failureFileName(locale)
		if (!files.has(file)) continue

		try {
			const keys = decodeFailures(await readFile(join(outputDir, file), 'utf8'))
			if (keys.length > 0) failures.set(locale, keys)
		} catch (error) {
			if (!(error instanceof BundleError)) throw error
			console.warn(`[Bundle] Ignoring ${file}: ${error.message}`)
		}
	}
	return failures
}
