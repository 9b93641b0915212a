/**
 * Batched translation with rate-limit backoff
 * Chunks run strictly in order; a failed chunk never aborts the rest
 */

import { setTimeout as delay } from 'node:timers/promises'
import {
	DEFAULT_BACKOFF_BASE_MS,
	DEFAULT_BATCH_PAUSE_MS,
	DEFAULT_BATCH_SIZE,
	DEFAULT_MAX_RETRIES,
} from '../config.js'
import type { BatchOptions, BatchResult, OracleResult, PhraseEntry, Sleep, TranslationOracle } from '../types.js'

const defaultSleep: Sleep = (ms) => delay(ms)

/**
 * Split entries into consecutive chunks of at most `size`
 */
export function chunkEntries<T>(entries: T[], size: number): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`Batch size must be a positive integer, got ${size}`)
	}

	const chunks: T[][] = []
	for (let i = 0; i < entries.length; i += size) {
		chunks.push(entries.slice(i, i + size))
	}
	return chunks
}

/**
 * Call the oracle, normalizing a rejected promise to a failed result
 */
async function callOracle(
	oracle: TranslationOracle,
	fromLocale: string,
	toLocale: string,
	texts: string[]
): Promise<OracleResult> {
	try {
		return await oracle(fromLocale, toLocale, texts)
	} catch (error) {
		return { status: 'failed', detail: error instanceof Error ? error.message : String(error) }
	}
}

/**
 * Translate one chunk, retrying while the oracle reports a rate limit.
 * Each rate-limited attempt is followed by a wait of base * 2^(attempt - 1),
 * so three attempts wait 10s, 20s and 40s before the chunk is given up.
 */
async function translateChunk(
	oracle: TranslationOracle,
	fromLocale: string,
	toLocale: string,
	texts: string[],
	maxRetries: number,
	backoffBaseMs: number,
	sleep: Sleep,
	label: string
): Promise<OracleResult> {
	let result: OracleResult = { status: 'failed', detail: 'no attempt made' }

	for (let attempt = 1; attempt <= maxRetries; attempt++) {
		result = await callOracle(oracle, fromLocale, toLocale, texts)
		if (result.status !== 'rate-limited') {
			return result
		}

		const waitMs = backoffBaseMs * 2 ** (attempt - 1)
		console.warn(`[Batch] ${label} rate limited, waiting ${waitMs}ms (attempt ${attempt}/${maxRetries})`)
		await sleep(waitMs)
	}

	return result
}

/**
 * Translate entries in fixed-size chunks
 *
 * @param oracle - Translation service
 * @param fromLocale - Source language (e.g., 'en')
 * @param toLocale - Target language (e.g., 'fr')
 * @param entries - Key/value pairs in the source language
 * @returns Translated values by key, plus the keys of every failed chunk
 */
export async function translateBatches(
	oracle: TranslationOracle,
	fromLocale: string,
	toLocale: string,
	entries: PhraseEntry[],
	options: BatchOptions = {}
): Promise<BatchResult> {
	const {
		batchSize = DEFAULT_BATCH_SIZE,
		maxRetries = DEFAULT_MAX_RETRIES,
		backoffBaseMs = DEFAULT_BACKOFF_BASE_MS,
		batchPauseMs = DEFAULT_BATCH_PAUSE_MS,
		sleep = defaultSleep,
		onChunkTranslated,
	} = options

	const chunks = chunkEntries(entries, batchSize)
	const merged = new Map<string, string>()
	const failedKeys: string[] = []

	for (let i = 0; i < chunks.length; i++) {
		const chunk = chunks[i]
		const label = `${toLocale} batch ${i + 1}/${chunks.length}`
		const texts = chunk.map((entry) => entry.value)

		const result = await translateChunk(oracle, fromLocale, toLocale, texts, maxRetries, backoffBaseMs, sleep, label)

		if (result.status !== 'ok') {
			console.error(`[Batch] ${label} failed (${result.status}): ${result.detail}`)
			failedKeys.push(...chunk.map((entry) => entry.key))
			continue
		}

		if (result.texts.length !== chunk.length) {
			console.error(`[Batch] ${label} returned ${result.texts.length} texts for ${chunk.length} phrases`)
			failedKeys.push(...chunk.map((entry) => entry.key))
			continue
		}

		const translated = chunk.map((entry, j) => ({ key: entry.key, value: result.texts[j] }))
		for (const entry of translated) {
			merged.set(entry.key, entry.value)
		}

		// Persistence errors propagate; only oracle failures degrade to failed keys
		if (onChunkTranslated) {
			await onChunkTranslated(translated)
		}

		if (i < chunks.length - 1) {
			await sleep(batchPauseMs)
		}
	}

	return { merged, failedKeys, chunkCount: chunks.length }
}
