/**
 * Configuration for the phrase sync engine
 * Batch and backoff defaults match the translator's published throughput limits
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from './errors.js'

// Keys starting with this prefix are bundle metadata, never translated
export const METADATA_PREFIX = '@'

export const DEFAULT_BATCH_SIZE = 100 // Max strings per translator request
export const DEFAULT_MAX_RETRIES = 3 // Attempts per rate-limited chunk
export const DEFAULT_BACKOFF_BASE_MS = 10_000 // 10s, 20s, 40s
export const DEFAULT_BATCH_PAUSE_MS = 3_000 // A batch of 100 can take up to 15s upstream

export const AZURE_ENDPOINT = 'https://api.cognitive.microsofttranslator.com'

const LOCALES_URL = new URL('../config/locales.json', import.meta.url)

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const localeList = z
	.string()
	.transform((raw) =>
		raw
			.split(',')
			.map((locale) => locale.trim())
			.filter(Boolean)
	)
	.pipe(z.array(z.string()).min(1))

const EnvSchema = z.object({
	POSTGRES_DB_URL: z.string().optional(),
	AZURE_TRANSLATOR_KEY: z.string().default(''),
	AZURE_TRANSLATOR_REGION: z.string().min(1).default('westeurope'),
	AZURE_TRANSLATOR_ENDPOINT: z.string().url().default(AZURE_ENDPOINT),
	SOURCE_LOCALE: z.string().min(1).default('en'),
	TARGET_LOCALES: localeList.optional(),
	SYNC_BATCH_SIZE: positiveInt(DEFAULT_BATCH_SIZE),
	SYNC_BATCH_PAUSE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_BATCH_PAUSE_MS),
	SYNC_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_BACKOFF_BASE_MS),
	SYNC_MAX_RETRIES: positiveInt(DEFAULT_MAX_RETRIES),
})

export interface SyncConfig {
	databaseUrl?: string
	azure: {
		apiKey: string
		region: string
		endpoint: string
	}
	sourceLocale: string
	targetLocales: string[]
	batch: {
		batchSize: number
		batchPauseMs: number
		backoffBaseMs: number
		maxRetries: number
	}
}

/**
 * Deduplicate a target list and drop the source locale from it
 */
function withoutSource(locales: string[], sourceLocale: string): string[] {
	return [...new Set(locales)].filter((locale) => locale !== sourceLocale)
}

/**
 * Parse a comma-separated locale list given on the command line
 * @throws ConfigError if no target locale remains
 */
export function parseLocaleList(raw: string, sourceLocale: string): string[] {
	const parsed = localeList.safeParse(raw)
	if (!parsed.success) {
		throw new ConfigError(`Invalid locale list "${raw}": ${parsed.error.issues[0].message}`)
	}
	const locales = withoutSource(parsed.data, sourceLocale)
	if (locales.length === 0) {
		throw new ConfigError(`Invalid locale list "${raw}": no target locale besides the source locale ${sourceLocale}`)
	}
	return locales
}

/**
 * Load the bundled list of supported target locales
 */
export async function loadDefaultLocales(): Promise<string[]> {
	const raw: unknown = JSON.parse(await readFile(LOCALES_URL, 'utf8'))
	return z.array(z.string().min(1)).parse(raw)
}

/**
 * Build the run configuration from environment variables
 * Empty strings count as unset so `.env` placeholders fall back to defaults
 *
 * @throws ConfigError naming the first invalid variable
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<SyncConfig> {
	const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
	const parsed = EnvSchema.safeParse(present)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new ConfigError(`Invalid ${issue.path.join('.')}: ${issue.message}`)
	}

	const vars = parsed.data
	const targetLocales = withoutSource(vars.TARGET_LOCALES ?? (await loadDefaultLocales()), vars.SOURCE_LOCALE)

	return {
		databaseUrl: vars.POSTGRES_DB_URL,
		azure: {
			apiKey: vars.AZURE_TRANSLATOR_KEY,
			region: vars.AZURE_TRANSLATOR_REGION,
			endpoint: vars.AZURE_TRANSLATOR_ENDPOINT,
		},
		sourceLocale: vars.SOURCE_LOCALE,
		targetLocales,
		batch: {
			batchSize: vars.SYNC_BATCH_SIZE,
			batchPauseMs: vars.SYNC_BATCH_PAUSE_MS,
			backoffBaseMs: vars.SYNC_BACKOFF_BASE_MS,
			maxRetries: vars.SYNC_MAX_RETRIES,
		},
	}
}
