import { describe, it, expect } from 'vitest'
import { formatAudit, formatSyncReport, hasFailures } from './report.js'
import type { LocaleReport, SyncReport } from './types.js'

const clean: LocaleReport = {
	locale: 'fr',
	translated: 2,
	failedKeys: [],
	skippedManual: ['title'],
	passThroughKeys: [],
	bundleSize: 3,
}

const broken: LocaleReport = {
	locale: 'de',
	translated: 0,
	failedKeys: ['greeting'],
	skippedManual: [],
	passThroughKeys: [],
	bundleSize: 0,
	error: 'Store save translations (de) failed: disk full',
}

describe('formatSyncReport', () => {
	it('summarizes a run without changes in one line', () => {
		const report: SyncReport = { outcome: 'no-changes', diffed: 0, locales: [] }

		expect(formatSyncReport(report)).toEqual(['No changes detected, all phrases are up to date'])
		expect(hasFailures(report)).toBe(false)
	})

	it('lists every locale and the ones that failed', () => {
		const report: SyncReport = { outcome: 'completed', diffed: 2, locales: [clean, broken] }

		expect(formatSyncReport(report)).toEqual([
			'Phrases diffed: 2',
			'  fr: 2 translated, 0 failed, 1 manual kept, 3 in bundle',
			'  de: 0 translated, 1 failed, 0 in bundle (error: Store save translations (de) failed: disk full)',
			'Locales with failures: de',
		])
		expect(hasFailures(report)).toBe(true)
	})

	it('mentions translations that came back unchanged', () => {
		const report: SyncReport = {
			outcome: 'completed',
			diffed: 1,
			locales: [{ ...clean, skippedManual: [], passThroughKeys: ['ok'] }],
		}

		expect(formatSyncReport(report)[1]).toBe('  fr: 2 translated, 0 failed, 1 unchanged by translator, 3 in bundle')
	})
})

describe('formatAudit', () => {
	it('prints OK for a clean locale', () => {
		expect(formatAudit('fr', [])).toEqual(['fr: OK'])
	})

	it('prints one line per issue', () => {
		expect(
			formatAudit('de', [
				{ key: 'farewell', kind: 'missing' },
				{ key: 'greeting', kind: 'untranslated', value: 'Hello' },
			])
		).toEqual(['de: 2 issues', '  missing farewell', '  untranslated greeting = "Hello"'])
	})
})
