/**
 * The controller's firmware_meta.json index
 *
 * Every mutation takes a timestamped backup of the current document first,
 * then rewrites it through a temp file renamed into place. There is no
 * locking: one invocation owns the cache root for the duration of a run.
 */

import { existsSync } from "node:fs"
import { copyFile, readFile, rename, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { z } from "zod"
import { IndexCorruptError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import {
	FILE_MODE,
	ensureDirectory,
	type OwnershipPolicy,
} from "./ownership.js"
import type { CacheEntry } from "./types.js"

export const META_FILENAME = "firmware_meta.json"

// Fields the controller adds are carried through untouched
const StoredEntrySchema = z
	.object({
		path: z.string().optional(),
	})
	.passthrough()

const MetaDocumentSchema = z
	.object({
		cached_firmwares: z.array(StoredEntrySchema),
	})
	.passthrough()

export type StoredEntry = z.infer<typeof StoredEntrySchema>
export type MetaDocument = z.infer<typeof MetaDocumentSchema>

export interface UpsertResult {
	backupPath: string
	/** An entry with the same path existed and was dropped */
	replaced: boolean
}

function pad(n: number): string {
	return String(n).padStart(2, "0")
}

/**
 * Local-time stamp used in backup names: YYYYMMDD-HHMMSS
 */
export function backupStamp(date: Date): string {
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	)
}

export class MetadataIndex {
	readonly cacheRoot: string
	readonly path: string
	private readonly ownership: OwnershipPolicy
	private readonly clock: () => Date

	constructor(
		cacheRoot: string,
		ownership: OwnershipPolicy,
		clock: () => Date = () => new Date(),
	) {
		this.cacheRoot = cacheRoot
		this.path = join(cacheRoot, META_FILENAME)
		this.ownership = ownership
		this.clock = clock
	}

	/**
	 * Create the cache root and an empty index when missing
	 * @returns true when a new document was written
	 */
	async ensureInitialized(): Promise<boolean> {
		await ensureDirectory(this.cacheRoot, this.ownership)
		if (existsSync(this.path)) return false

		await this.install({ cached_firmwares: [] })
		log.index.info({ path: this.path }, "created empty firmware index")
		return true
	}

	async read(): Promise<MetaDocument> {
		let raw: string
		try {
			raw = await readFile(this.path, "utf8")
		} catch (err) {
			throw new IndexCorruptError(this.path, errorMessage(err))
		}

		let json: unknown
		try {
			json = JSON.parse(raw)
		} catch (err) {
			throw new IndexCorruptError(this.path, errorMessage(err))
		}

		const result = MetaDocumentSchema.safeParse(json)
		if (!result.success) {
			const issue = result.error.issues[0]
			throw new IndexCorruptError(
				this.path,
				`${issue?.path.join(".") || "(root)"}: ${issue?.message ?? "unexpected shape"}`,
			)
		}
		return result.data
	}

	async entries(): Promise<StoredEntry[]> {
		return (await this.read()).cached_firmwares
	}

	/**
	 * Copy the current document to `<doc>.bak.<YYYYMMDD-HHMMSS>`
	 */
	async backup(): Promise<string> {
		const backupPath = `${this.path}.bak.${backupStamp(this.clock())}`
		await copyFile(this.path, backupPath)
		await this.ownership.apply(backupPath, FILE_MODE)
		log.index.debug({ backupPath }, "index backed up")
		return backupPath
	}

	/**
	 * Replace whatever entry has `entry.path` with `entry`. The removal and
	 * the addition are installed as two separate writes.
	 */
	async upsert(entry: CacheEntry): Promise<UpsertResult> {
		const current = await this.read()
		const backupPath = await this.backup()

		const kept = current.cached_firmwares.filter(e => e.path !== entry.path)
		const replaced = kept.length !== current.cached_firmwares.length

		const withoutEntry: MetaDocument = { ...current, cached_firmwares: kept }
		await this.install(withoutEntry)

		const withEntry: MetaDocument = {
			...withoutEntry,
			cached_firmwares: [
				...kept,
				{
					md5: entry.md5,
					version: entry.version,
					size: entry.size,
					path: entry.path,
					devices: [...entry.devices],
				},
			],
		}
		await this.install(withEntry)

		log.index.debug(
			{ path: entry.path, md5: entry.md5, replaced },
			"index entry written",
		)
		return { backupPath, replaced }
	}

	private async install(doc: MetaDocument): Promise<void> {
		const tmp = `${this.path}.tmp-${process.pid}`
		try {
			await writeFile(tmp, JSON.stringify(doc, null, 2) + "\n", "utf8")
			await this.ownership.apply(tmp, FILE_MODE)
			await rename(tmp, this.path)
		} catch (err) {
			await rm(tmp, { force: true })
			throw err
		}
	}
}
