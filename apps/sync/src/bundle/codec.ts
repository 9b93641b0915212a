/**
 * ARB bundle encoding
 * A bundle is a flat JSON object of key -> string; `@` keys are metadata
 */

import { z } from 'zod'
import { isMetadataKey } from '../catalog.js'
import { BundleError } from '../errors.js'

const BundleSchema = z.record(z.string(), z.unknown())

const BUNDLE_FILE = /^app_(.+)\.arb$/

/**
 * Locale as used in file names: `zh-Hant` -> `zh_Hant`
 */
export function normalizeLocaleForFilename(locale: string): string {
	return locale.replace(/-/g, '_')
}

export function bundleFileName(locale: string): string {
	return `app_${normalizeLocaleForFilename(locale)}.arb`
}

export function failureFileName(locale: string): string {
	return `app_errors_${normalizeLocaleForFilename(locale)}.txt`
}

/**
 * Locale for a bundle file name, or null if the name is not a bundle
 */
export function localeFromFileName(fileName: string): string | null {
	const match = BUNDLE_FILE.exec(fileName)
	if (!match || match[1].startsWith('errors')) {
		return null
	}
	return match[1].replace(/_/g, '-')
}

/**
 * Serialize a bundle with an `@@locale` header and two-space indentation
 * Metadata keys among the entries are not emitted
 */
export function encodeBundle(locale: string, entries: Map<string, string>): string {
	const bundle: Record<string, string> = { '@@locale': normalizeLocaleForFilename(locale) }
	for (const [key, value] of entries) {
		if (isMetadataKey(key)) continue
		bundle[key] = value
	}
	return `${JSON.stringify(bundle, null, 2)}\n`
}

/**
 * Parse bundle text into translatable entries, dropping metadata keys
 * @throws BundleError for invalid JSON, a non-object, or a non-string value
 */
export function decodeBundle(text: string): Map<string, string> {
	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error) {
		throw new BundleError('Bundle is not valid JSON', { cause: error })
	}

	const parsed = BundleSchema.safeParse(raw)
	if (!parsed.success || Array.isArray(raw)) {
		throw new BundleError('Bundle must be a JSON object')
	}

	const entries = new Map<string, string>()
	for (const [key, value] of Object.entries(parsed.data)) {
		if (isMetadataKey(key)) continue
		if (typeof value !== 'string') {
			throw new BundleError(`Bundle value for "${key}" is not a string`)
		}
		entries.set(key, value)
	}
	return entries
}

/**
 * Failure artifact: the failed keys as a JSON array
 */
export function encodeFailures(keys: string[]): string {
	return `${JSON.stringify(keys, null, 2)}\n`
}

/**
 * @throws BundleError unless the text is a JSON array of strings
 */
export function decodeFailures(text: string): string[] {
	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error) {
		throw new BundleError('Failure list is not valid JSON', { cause: error })
	}

	const parsed = z.array(z.string()).safeParse(raw)
	if (!parsed.success) {
		throw new BundleError('Failure list must be a JSON array of keys')
	}
	return parsed.data
}
