import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryPhraseStore, StorageError, type SourcePhrase, type Translation } from '@phrasesync/db'
import type { BundleSink } from './bundle/files.js'
import { syncTranslations, type SyncOptions } from './sync.js'
import type { OracleResult, SyncPhase, TranslationOracle } from './types.js'

const runAt = new Date('2024-05-01T12:00:00Z')

const dictionary: Record<string, Record<string, string>> = {
	fr: { Hello: 'Bonjour', Goodbye: 'Au revoir', 'Hello there': 'Bonjour à tous', OK: 'OK' },
	de: { Hello: 'Hallo', Goodbye: 'Auf Wiedersehen', 'Hello there': 'Hallo zusammen', OK: 'OK' },
}

interface OracleCall {
	to: string
	texts: string[]
}

function createOracle(failing = new Set<string>()) {
	const calls: OracleCall[] = []
	const oracle: TranslationOracle = async (_from, to, texts): Promise<OracleResult> => {
		calls.push({ to, texts })
		if (failing.has(to)) {
			return { status: 'failed', detail: 'Translator API error: 500' }
		}
		return { status: 'ok', texts: texts.map((text) => dictionary[to]?.[text] ?? `${to}:${text}`) }
	}
	return { oracle, calls }
}

class RecordingSink implements BundleSink {
	bundles = new Map<string, Map<string, string>>()
	failures = new Map<string, string[]>()
	writes = 0

	async writeBundle(locale: string, entries: Map<string, string>): Promise<void> {
		this.writes++
		this.bundles.set(locale, new Map(entries))
	}

	async writeFailures(locale: string, keys: string[]): Promise<void> {
		this.failures.set(locale, [...keys])
	}
}

/**
 * Memory store that fails source saves, or translation saves for chosen locales
 */
class FailingStore extends MemoryPhraseStore {
	failSourceSave = false
	failLocales = new Set<string>()

	async saveSourcePhrases(phrases: SourcePhrase[]): Promise<void> {
		if (this.failSourceSave) {
			throw new StorageError('save source phrases', new Error('disk full'))
		}
		await super.saveSourcePhrases(phrases)
	}

	async saveTranslations(translations: Translation[]): Promise<void> {
		const locale = translations.find((t) => this.failLocales.has(t.locale))?.locale
		if (locale) {
			throw new StorageError(`save translations (${locale})`, new Error('disk full'))
		}
		await super.saveTranslations(translations)
	}
}

const catalog = () =>
	new Map([
		['greeting', 'Hello'],
		['farewell', 'Goodbye'],
	])

describe('syncTranslations', () => {
	let store: FailingStore
	let sink: RecordingSink

	beforeEach(() => {
		store = new FailingStore()
		sink = new RecordingSink()
	})

	function run(oracle: TranslationOracle, overrides: Partial<SyncOptions> = {}) {
		return syncTranslations({
			store,
			oracle,
			phrases: catalog(),
			sourceLocale: 'en',
			targetLocales: ['fr'],
			batch: { sleep: async () => {} },
			sink,
			now: () => runAt,
			...overrides,
		})
	}

	it('translates a fresh catalog and writes the bundle', async () => {
		const { oracle, calls } = createOracle()

		const report = await run(oracle)

		expect(report).toEqual({
			outcome: 'completed',
			diffed: 2,
			locales: [
				{
					locale: 'fr',
					translated: 2,
					failedKeys: [],
					skippedManual: [],
					passThroughKeys: [],
					bundleSize: 2,
				},
			],
		})
		expect(calls).toEqual([{ to: 'fr', texts: ['Hello', 'Goodbye'] }])
		expect(await store.getTranslation('greeting', 'fr')).toEqual({
			phraseKey: 'greeting',
			locale: 'fr',
			value: 'Bonjour',
			provenance: 'automatic',
			lastUpdated: runAt,
		})
		expect([...sink.bundles.get('fr') ?? []]).toEqual([
			['farewell', 'Au revoir'],
			['greeting', 'Bonjour'],
		])
		expect(sink.failures.get('fr')).toEqual([])
		expect((await store.getAllSourcePhrases()).get('farewell')).toEqual({
			key: 'farewell',
			value: 'Goodbye',
			lastUpdated: runAt,
		})
	})

	it('does nothing on a second run with the same catalog', async () => {
		const { oracle, calls } = createOracle()
		await run(oracle)
		const phases: SyncPhase[] = []

		const report = await run(oracle, { onPhase: (phase) => phases.push(phase) })

		expect(report).toEqual({ outcome: 'no-changes', diffed: 0, locales: [] })
		expect(calls).toHaveLength(1)
		expect(sink.writes).toBe(1)
		expect(phases).toEqual(['init', 'diffing', 'no-changes', 'done'])
	})

	it('re-translates only changed phrases but bundles the full locale', async () => {
		const { oracle, calls } = createOracle()
		await run(oracle)

		const report = await run(oracle, {
			phrases: new Map([
				['greeting', 'Hello there'],
				['farewell', 'Goodbye'],
			]),
		})

		expect(report.diffed).toBe(1)
		expect(calls[1]).toEqual({ to: 'fr', texts: ['Hello there'] })
		expect([...sink.bundles.get('fr') ?? []]).toEqual([
			['farewell', 'Au revoir'],
			['greeting', 'Bonjour à tous'],
		])
	})

	it('never overwrites a manual translation', async () => {
		const { oracle, calls } = createOracle()
		await run(oracle, { targetLocales: ['fr', 'de'] })
		await store.saveTranslation({
			phraseKey: 'greeting',
			locale: 'fr',
			value: 'Salut',
			provenance: 'manual',
			lastUpdated: runAt,
		})

		const report = await run(oracle, {
			targetLocales: ['fr', 'de'],
			phrases: new Map([
				['greeting', 'Hello there'],
				['farewell', 'Goodbye'],
			]),
		})

		expect(report.locales[0]).toMatchObject({ locale: 'fr', translated: 0, skippedManual: ['greeting'] })
		expect(report.locales[1]).toMatchObject({ locale: 'de', translated: 1, skippedManual: [] })
		expect(calls.slice(2)).toEqual([{ to: 'de', texts: ['Hello there'] }])
		expect((await store.getTranslation('greeting', 'fr'))?.value).toBe('Salut')
		expect((await store.getTranslation('greeting', 'de'))?.value).toBe('Hallo zusammen')
		expect(sink.bundles.get('fr')?.get('greeting')).toBe('Salut')
	})

	it('records failed keys in the failure artifact and leaves them out of the bundle', async () => {
		const { oracle } = createOracle(new Set(['de']))

		const report = await run(oracle, { targetLocales: ['fr', 'de'] })

		expect(report.locales[1]).toEqual({
			locale: 'de',
			translated: 0,
			failedKeys: ['greeting', 'farewell'],
			skippedManual: [],
			passThroughKeys: [],
			bundleSize: 0,
		})
		expect(sink.failures.get('de')).toEqual(['greeting', 'farewell'])
		expect(sink.bundles.get('de')?.size).toBe(0)
		expect(sink.bundles.get('fr')?.size).toBe(2)
	})

	it('retries keys that failed in an earlier run even when nothing changed', async () => {
		await run(createOracle(new Set(['de'])).oracle, { targetLocales: ['fr', 'de'] })
		const { oracle, calls } = createOracle()

		const report = await run(oracle, {
			targetLocales: ['fr', 'de'],
			retry: new Map([['de', ['greeting', 'farewell', 'removed']]]),
		})

		expect(report.outcome).toBe('completed')
		expect(report.diffed).toBe(0)
		expect(calls).toEqual([{ to: 'de', texts: ['Hello', 'Goodbye'] }])
		expect(report.locales.map((l) => [l.locale, l.translated])).toEqual([
			['fr', 0],
			['de', 2],
		])
		expect(sink.failures.get('de')).toEqual([])
	})

	it('leaves changes for locales outside a partial run to the next full run', async () => {
		const { oracle, calls } = createOracle()
		await run(oracle, { targetLocales: ['fr', 'de'] })
		const updated = new Map([
			['greeting', 'Hello there'],
			['farewell', 'Goodbye'],
		])

		await run(oracle, { phrases: updated, targetLocales: ['fr'], deferredLocales: ['de'] })

		expect(sink.failures.get('de')).toEqual(['greeting'])
		expect((await store.getTranslation('greeting', 'de'))?.value).toBe('Hallo')

		const report = await run(oracle, { phrases: updated, targetLocales: ['fr', 'de'], retry: sink.failures })

		expect(report.outcome).toBe('completed')
		expect(calls.slice(2)).toEqual([
			{ to: 'fr', texts: ['Hello there'] },
			{ to: 'de', texts: ['Hello there'] },
		])
		expect((await store.getTranslation('greeting', 'de'))?.value).toBe('Hallo zusammen')
		expect(sink.failures.get('de')).toEqual([])
	})

	it('keeps earlier pending keys when deferring a locale again', async () => {
		const { oracle } = createOracle()

		await run(oracle, { deferredLocales: ['de'], retry: new Map([['de', ['title']]]) })

		expect(sink.failures.get('de')).toEqual(['title', 'greeting', 'farewell'])
	})

	it('refuses to defer locales without a sink', async () => {
		const { oracle } = createOracle()

		await expect(run(oracle, { sink: undefined, deferredLocales: ['de'] })).rejects.toThrow(RangeError)
	})

	it('aborts before translating when the delta cannot be saved', async () => {
		const { oracle, calls } = createOracle()
		store.failSourceSave = true

		await expect(run(oracle)).rejects.toThrow('Store save source phrases failed: disk full')
		expect(calls).toHaveLength(0)
		expect(sink.writes).toBe(0)
	})

	it('continues with the next locale when one locale cannot be saved', async () => {
		const { oracle } = createOracle()
		store.failLocales.add('fr')

		const report = await run(oracle, { targetLocales: ['fr', 'de'] })

		expect(report.locales[0]).toEqual({
			locale: 'fr',
			translated: 0,
			failedKeys: ['greeting', 'farewell'],
			skippedManual: [],
			passThroughKeys: [],
			bundleSize: 0,
			error: 'Store save translations (fr) failed: disk full',
		})
		expect(report.locales[1]).toMatchObject({ locale: 'de', translated: 2, failedKeys: [] })
		expect(sink.bundles.has('fr')).toBe(false)
		expect((await store.getTranslation('farewell', 'de'))?.value).toBe('Auf Wiedersehen')
	})

	it('re-translates everything when forced', async () => {
		const { oracle, calls } = createOracle()
		await run(oracle)

		const report = await run(oracle, { force: true })

		expect(report.diffed).toBe(2)
		expect(calls[1]).toEqual({ to: 'fr', texts: ['Hello', 'Goodbye'] })
	})

	it('flags translations that came back unchanged', async () => {
		const { oracle } = createOracle()

		const report = await run(oracle, {
			phrases: new Map([
				['greeting', 'Hello'],
				['ok', 'OK'],
			]),
		})

		expect(report.locales[0].passThroughKeys).toEqual(['ok'])
		expect(report.locales[0].translated).toBe(2)
	})

	it('reports each phase of a run', async () => {
		const { oracle } = createOracle()
		const phases: string[] = []

		await run(oracle, { onPhase: (phase, locale) => phases.push(locale ? `${phase}:${locale}` : phase) })

		expect(phases).toEqual(['init', 'diffing', 'translating:fr', 'merging:fr', 'done'])
	})
})
