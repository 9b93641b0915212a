/**
 * phrase-sync command-line entry point
 */

import 'dotenv/config'

import { StorageError } from '@phrasesync/db'
import { createProgram } from './program.js'
import { CatalogError, ConfigError } from './errors.js'

try {
	await createProgram().parseAsync(process.argv)
} catch (error) {
	if (error instanceof ConfigError || error instanceof CatalogError || error instanceof StorageError) {
		console.error(error.message)
	} else {
		console.error('Unhandled error:', error)
	}
	process.exitCode = 1
}
