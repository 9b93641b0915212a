/**
 * Durable-state I/O failure
 * Fatal to the operation that hit it, never to the process
 */
export class StorageError extends Error {
	readonly operation: string

	constructor(operation: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause)
		super(`Store ${operation} failed: ${reason}`, { cause })
		this.name = 'StorageError'
		this.operation = operation
	}
}
