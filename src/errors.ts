/**
 * Error taxonomy
 *
 * - FatalError: aborts the whole run with a non-zero exit code
 * - ItemError: one source failed; the batch records it and moves on
 * - IndexCorruptError: firmware_meta.json cannot be read back
 */

export const EXIT_FATAL = 1
export const EXIT_USAGE = 2

export class FatalError extends Error {
	readonly exitCode: number

	constructor(message: string, exitCode: number = EXIT_FATAL) {
		super(message)
		this.name = "FatalError"
		this.exitCode = exitCode
	}
}

export type ItemErrorKind =
	| "unresolved-identity"
	| "empty-source"
	| "catalog-absent"
	| "fetch-failed"
	| "unsafe-path"
	| "install-failed"

export class ItemError extends Error {
	readonly kind: ItemErrorKind
	/** URL, path or device code the failure belongs to */
	readonly source: string

	constructor(kind: ItemErrorKind, source: string, message: string) {
		super(message)
		this.name = "ItemError"
		this.kind = kind
		this.source = source
	}
}

export class IndexCorruptError extends Error {
	readonly indexPath: string

	constructor(indexPath: string, reason: string) {
		super(`Metadata index ${indexPath} is unreadable: ${reason}`)
		this.name = "IndexCorruptError"
		this.indexPath = indexPath
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
