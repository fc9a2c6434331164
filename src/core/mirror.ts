/**
 * Mirror builder
 *
 * Replicates every release of one controller version under a mirror root,
 * keeping the URL path (scheme and host dropped) so the tree can be served
 * as a stand-in for the download host. Sequential, in catalog order. Never
 * touches the firmware index or file ownership.
 */

import { mkdir } from "node:fs/promises"
import { dirname, join, posix } from "node:path"
import { listReleases } from "../catalog.js"
import type { Fetcher } from "../download.js"
import { errorMessage } from "../errors.js"
import { verifyChecksum } from "../hash.js"
import { urlPath } from "../identity.js"
import { log } from "../logger.js"
import { fileSize } from "../placement.js"
import type { Catalog, ChecksumCheck } from "../types.js"
import type { MirrorEvent, MirrorItem, MirrorReport } from "./types.js"

/**
 * Destination of a URL under the mirror root, or null when the URL path
 * is empty or climbs out of the root
 */
export function mirrorPath(
	mirrorRoot: string,
	url: string,
): { relativePath: string; dest: string } | null {
	const relativePath = posix.normalize(urlPath(url).replace(/^\/+/, ""))
	if (
		relativePath === "" ||
		relativePath === "." ||
		relativePath === ".." ||
		relativePath.startsWith("../") ||
		relativePath.endsWith("/")
	) {
		return null
	}
	return { relativePath, dest: join(mirrorRoot, ...relativePath.split("/")) }
}

async function checkMirrored(
	dest: string,
	expected: string | undefined,
): Promise<ChecksumCheck | undefined> {
	if (!expected) return undefined
	const verified = await verifyChecksum(dest, expected)
	return {
		expected: verified.expected,
		actual: verified.actual,
		matches: verified.matches,
	}
}

/**
 * Mirror one controller version's releases. The last event is always
 * mirror:complete.
 */
export async function* mirrorCatalog(
	catalog: Catalog,
	controllerVersion: string,
	mirrorRoot: string,
	fetcher: Fetcher,
): AsyncGenerator<MirrorEvent> {
	const releases = listReleases(catalog, controllerVersion)
	const report: MirrorReport = {
		controllerVersion,
		mirrorRoot,
		items: [],
		mirrored: 0,
		upToDate: 0,
		skipped: 0,
		failed: 0,
		checksumMismatches: 0,
	}

	await mkdir(mirrorRoot, { recursive: true })
	yield { type: "mirror:start", controllerVersion, mirrorRoot, total: releases.length }

	for (const { deviceCode, record } of releases) {
		const base = { deviceCode, version: record.version, url: record.url }
		let item: MirrorItem

		if (!record.url) {
			item = { ...base, relativePath: "", status: "skipped", error: "no URL in catalog" }
		} else {
			const target = mirrorPath(mirrorRoot, record.url)

			if (!target) {
				item = {
					...base,
					relativePath: "",
					status: "failed",
					error: `URL does not map to a path under the mirror root: ${record.url}`,
				}
			} else {
				try {
					let status: MirrorItem["status"] = "up-to-date"
					if ((await fileSize(target.dest)) === 0) {
						yield {
							type: "item:fetching",
							deviceCode,
							version: record.version,
							relativePath: target.relativePath,
						}
						await mkdir(dirname(target.dest), { recursive: true })
						await fetcher(record.url, target.dest)
						status = "mirrored"
					}

					const checksum = await checkMirrored(target.dest, record.checksum)
					item = checksum
						? { ...base, relativePath: target.relativePath, status, checksum }
						: { ...base, relativePath: target.relativePath, status }

					if (checksum && !checksum.matches) {
						report.checksumMismatches++
						log.mirror.warn(
							{ relativePath: target.relativePath, ...checksum },
							"checksum mismatch",
						)
						yield {
							type: "checksum:mismatch",
							relativePath: target.relativePath,
							expected: checksum.expected,
							actual: checksum.actual,
						}
					}
				} catch (err) {
					item = {
						...base,
						relativePath: target.relativePath,
						status: "failed",
						error: errorMessage(err),
					}
				}
			}
		}

		switch (item.status) {
			case "mirrored":
				report.mirrored++
				break
			case "up-to-date":
				report.upToDate++
				break
			case "skipped":
				report.skipped++
				break
			case "failed":
				report.failed++
				log.mirror.warn({ url: item.url, error: item.error }, "mirror item failed")
				break
		}

		report.items.push(item)
		yield { type: "item:done", item }
	}

	yield { type: "mirror:complete", report }
}

/**
 * Mirror and return only the final report
 */
export async function mirror(
	catalog: Catalog,
	controllerVersion: string,
	mirrorRoot: string,
	fetcher: Fetcher,
	onEvent?: (event: MirrorEvent) => void,
): Promise<MirrorReport> {
	let report: MirrorReport | undefined
	for await (const event of mirrorCatalog(catalog, controllerVersion, mirrorRoot, fetcher)) {
		onEvent?.(event)
		if (event.type === "mirror:complete") report = event.report
	}
	if (!report) {
		throw new Error("mirror ended without a report")
	}
	return report
}
