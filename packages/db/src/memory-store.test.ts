import { describe, it, expect } from 'vitest'
import { MemoryPhraseStore } from './memory-store.js'

const at = new Date('2024-03-01T12:00:00Z')

describe('MemoryPhraseStore', () => {
	it('upserts source phrases by key', async () => {
		const store = new MemoryPhraseStore()
		await store.saveSourcePhrases([{ key: 'greeting', value: 'Hello', lastUpdated: at }])
		await store.saveSourcePhrases([{ key: 'greeting', value: 'Hello (updated)', lastUpdated: at }])

		const phrases = await store.getAllSourcePhrases()
		expect(phrases.size).toBe(1)
		expect(phrases.get('greeting')?.value).toBe('Hello (updated)')
	})

	it('returns copies that do not leak mutations into the store', async () => {
		const store = new MemoryPhraseStore()
		await store.saveTranslation({ phraseKey: 'greeting', locale: 'fr', value: 'Bonjour', provenance: 'automatic', lastUpdated: at })

		const loaded = await store.getTranslation('greeting', 'fr')
		if (loaded) loaded.value = 'changed'

		expect((await store.getTranslation('greeting', 'fr'))?.value).toBe('Bonjour')
	})

	it('keeps locales separate and orders translations by key', async () => {
		const store = new MemoryPhraseStore()
		await store.saveTranslations([
			{ phraseKey: 'zebra', locale: 'fr', value: 'Zèbre', provenance: 'automatic', lastUpdated: at },
			{ phraseKey: 'apple', locale: 'fr', value: 'Pomme', provenance: 'manual', lastUpdated: at },
			{ phraseKey: 'apple', locale: 'de', value: 'Apfel', provenance: 'automatic', lastUpdated: at },
		])

		const fr = await store.getTranslationsForLocale('fr')
		expect([...fr.keys()]).toEqual(['apple', 'zebra'])
		expect(await store.isManual('apple', 'fr')).toBe(true)
		expect(await store.isManual('apple', 'de')).toBe(false)
		expect(await store.isManual('missing', 'fr')).toBe(false)
		expect(await store.listLocales()).toEqual(['de', 'fr'])
	})

	it('returns an empty map for a locale with no translations', async () => {
		const store = new MemoryPhraseStore()
		expect((await store.getTranslationsForLocale('ja')).size).toBe(0)
	})
})
