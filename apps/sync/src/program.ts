/**
 * Command definitions
 * Every command opens the store it needs and closes it again before returning
 */

import { Command } from 'commander'
import { closePool, createDatabase, ensureSchema, PgPhraseStore, type PhraseStore } from '@phrasesync/db'
import { FileBundleSink, exportBundles, importBundles, readFailures } from './bundle/files.js'
import { readCatalog } from './catalog.js'
import { loadConfig, parseLocaleList, type SyncConfig } from './config.js'
import { ConfigError } from './errors.js'
import { OverrideGuard } from './override-guard.js'
import { auditTranslations } from './quality.js'
import { formatAudit, formatSyncReport, hasFailures } from './report.js'
import { syncTranslations } from './sync.js'
import { createAzureOracle } from './translation/azure.js'
import type { TranslationOracle } from './types.js'

export interface ProgramDeps {
	loadConfig: () => Promise<SyncConfig>
	openStore: (config: SyncConfig) => PhraseStore
	applySchema: (config: SyncConfig) => Promise<void>
	createOracle: (config: SyncConfig) => TranslationOracle
	setExitCode: (code: number) => void
	now: () => Date
}

interface SyncCommandOptions {
	input: string
	out: string
	force?: boolean
	locales?: string
}

function requireDatabaseUrl(config: SyncConfig): void {
	if (!config.databaseUrl) {
		throw new ConfigError('POSTGRES_DB_URL is required for this command')
	}
}

const defaultDeps: ProgramDeps = {
	loadConfig: () => loadConfig(),
	openStore: (config) => {
		requireDatabaseUrl(config)
		return new PgPhraseStore()
	},
	applySchema: async (config) => {
		requireDatabaseUrl(config)
		try {
			await ensureSchema(createDatabase())
		} finally {
			await closePool()
		}
	},
	createOracle: (config) => createAzureOracle(config.azure),
	setExitCode: (code) => {
		process.exitCode = code
	},
	now: () => new Date(),
}

function print(lines: string[]): void {
	for (const line of lines) console.log(line)
}

export function createProgram(overrides: Partial<ProgramDeps> = {}): Command {
	const deps: ProgramDeps = { ...defaultDeps, ...overrides }

	async function withStore<T>(config: SyncConfig, work: (store: PhraseStore) => Promise<T>): Promise<T> {
		const store = deps.openStore(config)
		try {
			return await work(store)
		} finally {
			await store.close()
		}
	}

	const program = new Command()
		.name('phrase-sync')
		.description('Keep translated phrase bundles in sync with the source catalog')

	program
		.command('sync')
		.description('Translate new and changed phrases into every target locale')
		.option('-i, --input <file>', 'source catalog (JSON list of {key: value})', 'input/phrases.json')
		.option('-o, --out <dir>', 'bundle output directory', 'output')
		.option('-f, --force', 're-translate every phrase, not just changed ones')
		.option('-l, --locales <list>', 'comma-separated target locales (overrides TARGET_LOCALES)')
		.action(async (options: SyncCommandOptions) => {
			const config = await deps.loadConfig()
			const phrases = await readCatalog(options.input)
			const targetLocales = options.locales
				? parseLocaleList(options.locales, config.sourceLocale)
				: config.targetLocales
			const deferredLocales = config.targetLocales.filter((locale) => !targetLocales.includes(locale))

			console.log(`[Sync] ${phrases.size} source phrases, ${targetLocales.length} target locales`)

			const report = await withStore(config, async (store) =>
				syncTranslations({
					store,
					oracle: deps.createOracle(config),
					phrases,
					sourceLocale: config.sourceLocale,
					targetLocales,
					force: options.force ?? false,
					retry: await readFailures(options.out, [...targetLocales, ...deferredLocales]),
					deferredLocales,
					batch: config.batch,
					sink: new FileBundleSink(options.out),
					now: deps.now,
				})
			)

			print(formatSyncReport(report))
			if (hasFailures(report)) deps.setExitCode(1)
		})

	program
		.command('mark-manual')
		.description('Protect existing translations from being overwritten by sync')
		.argument('<locale>', 'locale of the translations')
		.argument('<keys...>', 'phrase keys to mark')
		.action(async (locale: string, keys: string[]) => {
			const config = await deps.loadConfig()
			const summary = await withStore(config, (store) => new OverrideGuard(store, deps.now).markManualMany(locale, keys))

			if (summary.marked.length > 0) {
				console.log(`Marked manual (${locale}): ${summary.marked.join(', ')}`)
			}
			if (summary.notFound.length > 0) {
				console.error(`No translation found (${locale}): ${summary.notFound.join(', ')}`)
				deps.setExitCode(1)
			}
		})

	program
		.command('export')
		.description('Write a bundle for every locale in the store')
		.argument('[dir]', 'output directory', 'output')
		.action(async (dir: string) => {
			const config = await deps.loadConfig()
			const summary = await withStore(config, async (store) =>
				exportBundles(store, await store.listLocales(), new FileBundleSink(dir))
			)
			console.log(`Exported ${summary.exported.length} locales to ${dir}`)
		})

	program
		.command('import')
		.description('Load existing bundles into the store; the source-locale bundle seeds the source phrases')
		.argument('[dir]', 'bundle directory', 'output')
		.action(async (dir: string) => {
			const config = await deps.loadConfig()
			const summary = await withStore(config, (store) =>
				importBundles(dir, store, { sourceLocale: config.sourceLocale, now: deps.now })
			)

			if (summary.sourcePhrases > 0) {
				console.log(`Recorded ${summary.sourcePhrases} source phrases`)
			}
			const total = summary.imported.reduce((sum, entry) => sum + entry.count, 0)
			console.log(`Imported ${total} translations across ${summary.imported.length} locales`)
			if (summary.keptManual > 0) {
				console.log(`Kept ${summary.keptManual} manual translations`)
			}
			if (summary.failedFiles.length > 0) {
				for (const failed of summary.failedFiles) console.error(`Skipped ${failed.file}: ${failed.reason}`)
				deps.setExitCode(1)
			}
		})

	program
		.command('check')
		.description('Report missing, empty and untranslated phrases per locale')
		.action(async () => {
			const config = await deps.loadConfig()
			const issueCount = await withStore(config, async (store) => {
				const sources = await store.getAllSourcePhrases()
				let count = 0
				for (const locale of config.targetLocales) {
					const issues = auditTranslations(sources, await store.getTranslationsForLocale(locale))
					print(formatAudit(locale, issues))
					count += issues.length
				}
				return count
			})

			if (issueCount > 0) deps.setExitCode(1)
		})

	program
		.command('init-db')
		.description('Create the phrase tables if they do not exist')
		.action(async () => {
			const config = await deps.loadConfig()
			await deps.applySchema(config)
			console.log('Schema is up to date')
		})

	return program
}
