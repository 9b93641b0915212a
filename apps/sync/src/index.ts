/**
 * Phrase sync engine re-exports
 */

export { syncTranslations, type SyncOptions } from './sync.js'
export { computeDelta, type DeltaOptions } from './diff.js'
export { OverrideGuard, type GuardPartition, type MarkManualResult, type MarkManualSummary } from './override-guard.js'
export { chunkEntries, translateBatches } from './translation/batch-translator.js'
export { createAzureOracle, type AzureOracleConfig } from './translation/azure.js'
export {
	bundleFileName,
	decodeBundle,
	decodeFailures,
	encodeBundle,
	encodeFailures,
	failureFileName,
	localeFromFileName,
	normalizeLocaleForFilename,
} from './bundle/codec.js'
export {
	FileBundleSink,
	exportBundles,
	importBundles,
	readFailures,
	toBundleEntries,
	type BundleSink,
	type ExportSummary,
	type ImportOptions,
	type ImportSummary,
} from './bundle/files.js'
export { isMetadataKey, parseCatalog, readCatalog } from './catalog.js'
export { auditTranslations, findPassThrough, isPassThrough, type IssueKind, type TranslationIssue } from './quality.js'
export { loadConfig, loadDefaultLocales, parseLocaleList, type SyncConfig } from './config.js'
export { formatAudit, formatSyncReport, hasFailures } from './report.js'
export { createProgram, type ProgramDeps } from './program.js'
export { BundleError, CatalogError, ConfigError } from './errors.js'
export type {
	BatchOptions,
	BatchResult,
	LocaleReport,
	OracleResult,
	PhraseEntry,
	Sleep,
	SyncPhase,
	SyncReport,
	TranslationOracle,
} from './types.js'
