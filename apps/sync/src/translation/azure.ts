/**
 * Azure Translator API integration
 * Maps HTTP outcomes onto OracleResult; never throws
 */

import { z } from 'zod'
import { AZURE_ENDPOINT } from '../config.js'
import type { OracleResult, TranslationOracle } from '../types.js'

const RATE_LIMIT_STATUS = 429

const TranslateResponseSchema = z.array(
	z.object({
		translations: z.array(z.object({ text: z.string(), to: z.string() })).min(1),
	})
)

export interface AzureOracleConfig {
	apiKey: string
	region: string
	endpoint?: string
	fetch?: typeof fetch
}

/**
 * Create an oracle backed by the Translator v3 `translate` endpoint.
 * All texts of a call go in one request body; results come back in request order.
 */
export function createAzureOracle(config: AzureOracleConfig): TranslationOracle {
	const { apiKey, region, endpoint = AZURE_ENDPOINT, fetch: fetchImpl = fetch } = config

	return async (fromLocale: string, toLocale: string, texts: string[]): Promise<OracleResult> => {
		if (texts.length === 0) {
			return { status: 'ok', texts: [] }
		}
		if (!apiKey) {
			return { status: 'failed', detail: 'AZURE_TRANSLATOR_KEY is not set' }
		}

		const url = new URL('translate', endpoint.endsWith('/') ? endpoint : `${endpoint}/`)
		url.searchParams.set('api-version', '3.0')
		url.searchParams.set('from', fromLocale)
		url.searchParams.set('to', toLocale)

		let response: Response
		try {
			response = await fetchImpl(url, {
				method: 'POST',
				headers: {
					'Ocp-Apim-Subscription-Key': apiKey,
					'Ocp-Apim-Subscription-Region': region,
					'Content-Type': 'application/json',
				},
				body: JSON.stringify(texts.map((text) => ({ text }))),
			})
		} catch (error) {
			return { status: 'failed', detail: `Request failed: ${error instanceof Error ? error.message : String(error)}` }
		}

		// A body that cannot be read must not turn a rate limit into a failure
		const readText = () => response.text().catch(() => '')

		if (response.status === RATE_LIMIT_STATUS) {
			return { status: 'rate-limited', detail: `${response.status} ${await readText()}`.trimEnd() }
		}

		if (!response.ok) {
			const errorText = await readText()
			return { status: 'failed', detail: `Translator API error: ${response.status} ${response.statusText} ${errorText}` }
		}

		let body: unknown
		try {
			body = await response.json()
		} catch (error) {
			return { status: 'failed', detail: `Unreadable response: ${error instanceof Error ? error.message : String(error)}` }
		}

		const parsed = TranslateResponseSchema.safeParse(body)
		if (!parsed.success) {
			return { status: 'failed', detail: `Unexpected response format: ${JSON.stringify(body)}` }
		}

		return { status: 'ok', texts: parsed.data.map((item) => item.translations[0].text) }
	}
}
