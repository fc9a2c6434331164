/**
 * Cache run
 *
 * Feeds source batches through identity resolution and placement, in a
 * fixed order: catalog, source directory, explicit URLs/files, URL+file
 * pairs. Every item ends as an ItemOutcome; item errors are recorded and
 * the batch continues, anything else aborts the run.
 */

import { readdirSync, statSync } from "node:fs"
import { extname, join } from "node:path"
import { lookupRelease } from "../catalog.js"
import { FatalError, ItemError, EXIT_USAGE } from "../errors.js"
import { isUrlSource } from "../identity.js"
import { log } from "../logger.js"
import {
	placeFromCatalogRecord,
	placeFromUrl,
	placeLocalFile,
	placeLocalWithUrl,
	type PlacementContext,
	type PlacementResult,
} from "../placement.js"
import type { Catalog, ItemOutcome } from "../types.js"
import type { BatchKind, CacheEvent, CacheReport } from "./types.js"

export interface SourcePair {
	url: string
	path: string
}

export interface CatalogRequest {
	catalog: Catalog
	controllerVersion: string
	codes: string[]
}

export interface CachePlan {
	catalog?: CatalogRequest | undefined
	sourceDir?: string | undefined
	/** URLs or local file paths */
	sources: string[]
	pairs: SourcePair[]
}

/** Extensions picked up from a source directory, in processing order */
export const SOURCE_DIR_EXTENSIONS = [".bin", ".tar"]

export function hasCacheWork(plan: CachePlan): boolean {
	return (
		plan.catalog !== undefined ||
		plan.sourceDir !== undefined ||
		plan.sources.length > 0 ||
		plan.pairs.length > 0
	)
}

function isRegularFile(path: string): boolean {
	try {
		return statSync(path).isFile()
	} catch {
		// dangling symlink or entry removed since readdir
		return false
	}
}

/**
 * Firmware files in a directory: all *.bin, then all *.tar, each sorted.
 * Extensions match case-sensitively.
 */
export function scanSourceDir(dir: string): string[] {
	let names: string[]
	try {
		if (!statSync(dir).isDirectory()) {
			throw new FatalError(`Not a directory: ${dir}`, EXIT_USAGE)
		}
		names = readdirSync(dir)
	} catch (err) {
		if (err instanceof FatalError) throw err
		throw new FatalError(`Source directory not found: ${dir}`, EXIT_USAGE)
	}

	const files: string[] = []
	for (const ext of SOURCE_DIR_EXTENSIONS) {
		const matching = names
			.filter(name => extname(name) === ext)
			.sort()
			.map(name => join(dir, name))
			.filter(isRegularFile)
		files.push(...matching)
	}
	return files
}

async function attempt(
	fn: () => Promise<PlacementResult>,
): Promise<ItemOutcome<PlacementResult>> {
	try {
		return { ok: true, value: await fn() }
	} catch (err) {
		if (err instanceof ItemError) {
			return { ok: false, error: err }
		}
		throw err
	}
}

interface WorkItem {
	source: string
	run: () => Promise<PlacementResult>
}

function catalogItems(ctx: PlacementContext, request: CatalogRequest): WorkItem[] {
	return request.codes.map(code => ({
		source: code,
		run: async () => {
			const record = lookupRelease(request.catalog, request.controllerVersion, code)
			if (!record) {
				throw new ItemError(
					"catalog-absent",
					code,
					`No catalog entry for ${code} in controller version ${request.controllerVersion}`,
				)
			}
			return placeFromCatalogRecord(ctx, code, record)
		},
	}))
}

function sourceItems(ctx: PlacementContext, sources: string[]): WorkItem[] {
	return sources
		.filter(source => source !== "")
		.map(source => ({
			source,
			run: () =>
				isUrlSource(source) ? placeFromUrl(ctx, source) : placeLocalFile(ctx, source),
		}))
}

/**
 * Run every batch of the plan. The last event is always run:complete.
 */
export async function* runCache(
	plan: CachePlan,
	ctx: PlacementContext,
): AsyncGenerator<CacheEvent> {
	const report: CacheReport = { placed: [], failed: [], checksumMismatches: 0 }

	const created = await ctx.index.ensureInitialized()
	yield { type: "index:ready", path: ctx.index.path, created }

	const batches: { batch: BatchKind; label: string; items: () => WorkItem[] }[] = []

	if (plan.catalog) {
		const request = plan.catalog
		batches.push({
			batch: "catalog",
			label: `catalog (controller ${request.controllerVersion})`,
			items: () => catalogItems(ctx, request),
		})
	}

	if (plan.sourceDir !== undefined) {
		const dir = plan.sourceDir
		batches.push({
			batch: "source-dir",
			label: `source directory ${dir}`,
			items: () => sourceItems(ctx, scanSourceDir(dir)),
		})
	}

	if (plan.sources.length > 0) {
		batches.push({
			batch: "sources",
			label: "URLs and files",
			items: () => sourceItems(ctx, plan.sources),
		})
	}

	if (plan.pairs.length > 0) {
		batches.push({
			batch: "pairs",
			label: "files with source URL",
			items: () =>
				plan.pairs.map(pair => ({
					source: pair.path,
					run: () => placeLocalWithUrl(ctx, pair.url, pair.path),
				})),
		})
	}

	for (const { batch, label, items: build } of batches) {
		const items = build()
		yield { type: "batch:start", batch, count: items.length, label }

		for (const item of items) {
			const outcome = await attempt(item.run)

			if (!outcome.ok) {
				const failed = {
					batch,
					source: outcome.error.source,
					kind: outcome.error.kind,
					error: outcome.error.message,
				}
				report.failed.push(failed)
				log.placement.warn(failed, "item skipped")
				yield { type: "item:failed", ...failed }
				continue
			}

			const { entry, fetched, checksum } = outcome.value
			if (checksum && !checksum.matches) {
				report.checksumMismatches++
				yield {
					type: "checksum:mismatch",
					batch,
					source: item.source,
					path: entry.path,
					expected: checksum.expected,
					actual: checksum.actual,
				}
			}

			const placed = { batch, source: item.source, entry, fetched }
			report.placed.push(placed)
			yield { type: "item:placed", ...placed }
		}
	}

	yield { type: "run:complete", report }
}

/**
 * Drain a cache run and return its report
 */
export async function collectCacheReport(
	events: AsyncGenerator<CacheEvent>,
	onEvent?: (event: CacheEvent) => void,
): Promise<CacheReport> {
	let report: CacheReport | undefined
	for await (const event of events) {
		onEvent?.(event)
		if (event.type === "run:complete") report = event.report
	}
	if (!report) {
		throw new Error("cache run ended without a report")
	}
	return report
}
