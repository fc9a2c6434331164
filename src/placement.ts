/**
 * Placement engine
 *
 * Puts firmware images at `<cacheRoot>/<deviceCode>/<version>/<filename>`
 * and records them in firmware_meta.json under the relative path. Placing
 * the same triple again overwrites the file and replaces the index entry.
 */

import { stat } from "node:fs/promises"
import { basename, join, posix } from "node:path"
import type { Fetcher } from "./download.js"
import { ItemError, errorMessage } from "./errors.js"
import { hashFile, verifyChecksum, type FileHash } from "./hash.js"
import { resolveIdentity, sourceFilename } from "./identity.js"
import { log } from "./logger.js"
import type { MetadataIndex } from "./meta-index.js"
import {
	FILE_MODE,
	ensureDirectory,
	installFile,
	type OwnershipPolicy,
} from "./ownership.js"
import type {
	CacheEntry,
	ChecksumCheck,
	Identity,
	IdentityOverrides,
	ReleaseRecord,
} from "./types.js"

export interface PlacementContext {
	cacheRoot: string
	overrides: IdentityOverrides
	ownership: OwnershipPolicy
	index: MetadataIndex
	fetcher: Fetcher
}

export interface CachePaths {
	dir: string
	file: string
	/** Index key: `<deviceCode>/<version>/<filename>` */
	relative: string
}

export interface PlacementResult {
	entry: CacheEntry
	/** The content came over the network during this call */
	fetched: boolean
	/** Present when the catalog declared a checksum */
	checksum?: ChecksumCheck
}

/**
 * Size of a file, or 0 when it does not exist
 */
export async function fileSize(path: string): Promise<number> {
	try {
		const info = await stat(path)
		return info.isFile() ? info.size : 0
	} catch {
		return 0
	}
}

function assertSafeSegment(value: string, label: string, source: string): void {
	if (!value || value === "." || value === ".." || /[/\\]/.test(value)) {
		throw new ItemError(
			"unsafe-path",
			source,
			`Refusing ${label} "${value}" as a cache path segment`,
		)
	}
}

export function cachePaths(
	cacheRoot: string,
	identity: Identity,
	filename: string,
	source = filename,
): CachePaths {
	assertSafeSegment(identity.deviceCode, "device code", source)
	assertSafeSegment(identity.version, "version", source)
	assertSafeSegment(filename, "filename", source)

	const dir = join(cacheRoot, identity.deviceCode, identity.version)
	return {
		dir,
		file: join(dir, filename),
		relative: posix.join(identity.deviceCode, identity.version, filename),
	}
}

async function recordEntry(
	ctx: PlacementContext,
	identity: Identity,
	paths: CachePaths,
	knownHash?: FileHash,
): Promise<CacheEntry> {
	const hash = knownHash ?? (await hashFile(paths.file))
	const entry: CacheEntry = {
		md5: hash.md5,
		version: identity.version,
		size: hash.size,
		path: paths.relative,
		devices: [identity.deviceCode],
	}
	await ctx.index.upsert(entry)
	return entry
}

function unresolved(source: string): ItemError {
	return new ItemError(
		"unresolved-identity",
		source,
		`Could not determine device code/version for ${source}; set DEV_FAMILY and VERSION (--dev-family/--version)`,
	)
}

async function prepareDirectory(
	ctx: PlacementContext,
	paths: CachePaths,
	source: string,
): Promise<void> {
	try {
		await ensureDirectory(paths.dir, ctx.ownership)
	} catch (err) {
		throw new ItemError(
			"install-failed",
			source,
			`Cannot create ${paths.dir}: ${errorMessage(err)}`,
		)
	}
}

async function fetchInto(
	ctx: PlacementContext,
	url: string,
	paths: CachePaths,
): Promise<void> {
	try {
		await ctx.fetcher(url, paths.file)
		await ctx.ownership.apply(paths.file, FILE_MODE)
	} catch (err) {
		throw new ItemError("fetch-failed", url, errorMessage(err))
	}
}

/**
 * Install a local file into the cache and index it
 */
export async function place(
	ctx: PlacementContext,
	identity: Identity,
	sourceFile: string,
	filename: string,
): Promise<CacheEntry> {
	if ((await fileSize(sourceFile)) === 0) {
		throw new ItemError(
			"empty-source",
			sourceFile,
			`Source file is missing or empty: ${sourceFile}`,
		)
	}

	const paths = cachePaths(ctx.cacheRoot, identity, filename, sourceFile)
	await prepareDirectory(ctx, paths, sourceFile)

	try {
		await installFile(sourceFile, paths.file, ctx.ownership)
	} catch (err) {
		throw new ItemError(
			"install-failed",
			sourceFile,
			`Cannot install ${sourceFile} to ${paths.file}: ${errorMessage(err)}`,
		)
	}

	log.placement.debug({ source: sourceFile, path: paths.relative }, "placed")
	return recordEntry(ctx, identity, paths)
}

/**
 * Local file; identity comes from its name (or the overrides)
 */
export async function placeLocalFile(
	ctx: PlacementContext,
	path: string,
): Promise<PlacementResult> {
	const identity = resolveIdentity(path, ctx.overrides)
	if (!identity) throw unresolved(path)

	const entry = await place(ctx, identity, path, basename(path))
	return { entry, fetched: false }
}

/**
 * Local file whose original download URL is known: identity and filename
 * come from the URL, content from the file
 */
export async function placeLocalWithUrl(
	ctx: PlacementContext,
	url: string,
	path: string,
): Promise<PlacementResult> {
	if ((await fileSize(path)) === 0) {
		throw new ItemError(
			"empty-source",
			path,
			`Source file is missing or empty: ${path} (URL: ${url})`,
		)
	}

	const identity = resolveIdentity(url, ctx.overrides)
	if (!identity) throw unresolved(url)

	const entry = await place(ctx, identity, path, sourceFilename(url))
	return { entry, fetched: false }
}

/**
 * Fetch a URL straight into its cache location and index it
 */
export async function placeFromUrl(
	ctx: PlacementContext,
	url: string,
): Promise<PlacementResult> {
	const identity = resolveIdentity(url, ctx.overrides)
	if (!identity) throw unresolved(url)

	const paths = cachePaths(ctx.cacheRoot, identity, sourceFilename(url), url)
	await prepareDirectory(ctx, paths, url)
	await fetchInto(ctx, url, paths)

	log.placement.debug({ url, path: paths.relative }, "fetched")
	const entry = await recordEntry(ctx, identity, paths)
	return { entry, fetched: true }
}

/**
 * Catalog release for one device code. An existing non-empty file is kept
 * (ownership re-applied); the catalog checksum is checked either way and a
 * mismatch is reported, not enforced.
 */
export async function placeFromCatalogRecord(
	ctx: PlacementContext,
	deviceCode: string,
	record: ReleaseRecord,
): Promise<PlacementResult> {
	const identity: Identity = { deviceCode, version: record.version }
	const paths = cachePaths(
		ctx.cacheRoot,
		identity,
		sourceFilename(record.url),
		deviceCode,
	)
	await prepareDirectory(ctx, paths, deviceCode)

	let fetched = false
	if ((await fileSize(paths.file)) > 0) {
		await installFile(paths.file, paths.file, ctx.ownership)
	} else {
		await fetchInto(ctx, record.url, paths)
		fetched = true
	}

	let checksum: ChecksumCheck | undefined
	let hash: FileHash | undefined
	if (record.checksum) {
		const verified = await verifyChecksum(paths.file, record.checksum)
		checksum = {
			expected: verified.expected,
			actual: verified.actual,
			matches: verified.matches,
		}
		hash = verified.hash
		if (!verified.matches) {
			log.placement.warn(
				{ path: paths.relative, expected: verified.expected, actual: verified.actual },
				"checksum mismatch",
			)
		}
	}

	const entry = await recordEntry(ctx, identity, paths, hash)
	return checksum ? { entry, fetched, checksum } : { entry, fetched }
}
