/**
 * Run summaries for the command line
 */

import type { TranslationIssue } from './quality.js'
import type { LocaleReport, SyncReport } from './types.js'

export function localeFailed(locale: LocaleReport): boolean {
	return locale.error !== undefined || locale.failedKeys.length > 0
}

export function hasFailures(report: SyncReport): boolean {
	return report.locales.some(localeFailed)
}

function formatLocale(locale: LocaleReport): string {
	let line = `  ${locale.locale}: ${locale.translated} translated, ${locale.failedKeys.length} failed`
	if (locale.skippedManual.length > 0) line += `, ${locale.skippedManual.length} manual kept`
	if (locale.passThroughKeys.length > 0) line += `, ${locale.passThroughKeys.length} unchanged by translator`
	line += `, ${locale.bundleSize} in bundle`
	if (locale.error) line += ` (error: ${locale.error})`
	return line
}

export function formatSyncReport(report: SyncReport): string[] {
	if (report.outcome === 'no-changes') {
		return ['No changes detected, all phrases are up to date']
	}

	const lines = [`Phrases diffed: ${report.diffed}`, ...report.locales.map(formatLocale)]
	const failed = report.locales.filter(localeFailed).map((locale) => locale.locale)
	if (failed.length > 0) {
		lines.push(`Locales with failures: ${failed.join(', ')}`)
	}
	return lines
}

export function formatAudit(locale: string, issues: TranslationIssue[]): string[] {
	if (issues.length === 0) {
		return [`${locale}: OK`]
	}
	return [
		`${locale}: ${issues.length} issue${issues.length === 1 ? '' : 's'}`,
		...issues.map((issue) => `  ${issue.kind} ${issue.key}` + (issue.value !== undefined ? ` = ${JSON.stringify(issue.value)}` : '')),
	]
}
