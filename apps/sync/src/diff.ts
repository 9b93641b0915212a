/**
 * Change detection against the recorded source phrases
 */

import type { SourcePhrase } from '@phrasesync/db'
import type { PhraseEntry } from './types.js'

export interface DeltaOptions {
	forceAll?: boolean // Return every incoming entry (full re-translation)
}

/**
 * Entries that are new or whose value changed since they were recorded,
 * in the iteration order of `incoming`. Pure; the order of `stored` is irrelevant.
 */
export function computeDelta(
	incoming: Map<string, string>,
	stored: Map<string, SourcePhrase>,
	options: DeltaOptions = {}
): PhraseEntry[] {
	const delta: PhraseEntry[] = []
	for (const [key, value] of incoming) {
		if (options.forceAll || stored.get(key)?.value !== value) {
			delta.push({ key, value })
		}
	}
	return delta
}
