/**
 * Source catalog loading
 * The catalog is a JSON list of single-entry { key: value } objects
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { METADATA_PREFIX } from './config.js'
import { CatalogError } from './errors.js'

const CatalogSchema = z.array(z.record(z.string(), z.string()))

export function isMetadataKey(key: string): boolean {
	return key.startsWith(METADATA_PREFIX)
}

/**
 * Flatten catalog entries into an ordered key -> value map
 * Duplicate keys: last write wins, the key keeps its first position
 * Metadata keys are dropped
 */
export function parseCatalog(raw: unknown): Map<string, string> {
	const parsed = CatalogSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new CatalogError(`Malformed catalog at [${issue.path.join('.')}]: ${issue.message}`)
	}

	const phrases = new Map<string, string>()
	for (const entry of parsed.data) {
		for (const [key, value] of Object.entries(entry)) {
			if (isMetadataKey(key)) continue
			phrases.set(key, value)
		}
	}
	return phrases
}

/**
 * Read and parse a catalog file
 * @throws CatalogError if the file is missing, not JSON or not a list of string maps
 */
export async function readCatalog(filePath: string): Promise<Map<string, string>> {
	let text: string
	try {
		text = await readFile(filePath, 'utf8')
	} catch (error) {
		throw new CatalogError(`Cannot read catalog ${filePath}`, { cause: error })
	}

	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error) {
		throw new CatalogError(`Catalog ${filePath} is not valid JSON`, { cause: error })
	}

	return parseCatalog(raw)
}
