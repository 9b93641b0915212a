/**
 * Invalid environment configuration
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

/**
 * Source catalog file is unreadable or malformed
 */
export class CatalogError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'CatalogError'
	}
}

/**
 * Bundle file does not hold a flat key -> string object
 */
export class BundleError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'BundleError'
	}
}
