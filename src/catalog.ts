/**
 * Controller firmware catalog (firmware.json)
 *
 * Shape: { "<controller version>": { "release": { "<device code>":
 *   { "version", "url", "md5sum" } } } }
 *
 * The document is decoded once at load time. Only a non-object document is
 * fatal. Top-level values that are not release sets (metadata such as a
 * generation timestamp) are ignored, and a malformed record is skipped with
 * a warning, so the lookup for that device code finds nothing.
 */

import { readFileSync } from "node:fs"
import { z } from "zod"
import { FatalError, errorMessage } from "./errors.js"
import { log } from "./logger.js"
import type { Catalog, ReleaseRecord, ReleaseSet } from "./types.js"

const ReleaseRecordSchema = z
	.object({
		version: z.string().nullish(),
		url: z.string().nullish(),
		md5sum: z.string().nullish(),
	})
	.transform(
		(record): ReleaseRecord => ({
			version: (record.version ?? "").trim(),
			url: (record.url ?? "").trim(),
			checksum: record.md5sum?.trim() || undefined,
		}),
	)

const ReleaseSetSchema = z.object({
	release: z.record(z.string(), z.unknown()).nullish(),
})

const CatalogDocumentSchema = z.record(z.string(), z.unknown())

/** Controller-version keys considered by auto-detection */
const CONTROLLER_VERSION_KEY = /^\d+\.\d+/

function describeIssue(error: z.ZodError): string {
	const issue = error.issues[0]
	const where = issue?.path.length ? issue.path.join(".") : "(root)"
	return `${where}: ${issue?.message ?? "unexpected shape"}`
}

function decodeReleases(
	controllerVersion: string,
	release: Record<string, unknown>,
	source: string,
): ReleaseSet {
	const releases: ReleaseSet = {}
	for (const [deviceCode, raw] of Object.entries(release)) {
		const record = ReleaseRecordSchema.safeParse(raw)
		if (!record.success) {
			log.catalog.warn(
				{ source, controllerVersion, deviceCode, issue: describeIssue(record.error) },
				"catalog record skipped",
			)
			continue
		}
		releases[deviceCode] = record.data
	}
	return releases
}

/**
 * Decode a parsed firmware.json document
 */
export function parseCatalog(json: unknown, source = "catalog"): Catalog {
	const doc = CatalogDocumentSchema.safeParse(json)
	if (!doc.success) {
		throw new FatalError(`Invalid catalog ${source}: ${describeIssue(doc.error)}`)
	}

	const catalog: Catalog = {}
	for (const [controllerVersion, value] of Object.entries(doc.data)) {
		const set = ReleaseSetSchema.safeParse(value)
		if (!set.success) {
			const details = { source, controllerVersion, issue: describeIssue(set.error) }
			if (CONTROLLER_VERSION_KEY.test(controllerVersion)) {
				log.catalog.warn(details, "catalog release set skipped")
			} else {
				log.catalog.debug(details, "non-release catalog key ignored")
			}
			continue
		}
		catalog[controllerVersion] = decodeReleases(
			controllerVersion,
			set.data.release ?? {},
			source,
		)
	}
	return catalog
}

/**
 * Read and decode the catalog file
 */
export function loadCatalog(path: string): Catalog {
	let raw: string
	try {
		raw = readFileSync(path, "utf8")
	} catch (err) {
		throw new FatalError(`Catalog not readable: ${path} (${errorMessage(err)})`)
	}

	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (err) {
		throw new FatalError(`Catalog is not valid JSON: ${path} (${errorMessage(err)})`)
	}

	const catalog = parseCatalog(json, path)
	log.catalog.debug(
		{ path, controllerVersions: Object.keys(catalog).length },
		"catalog loaded",
	)
	return catalog
}

/**
 * Release record for one device code, or null when the catalog has none
 * (missing key, or empty version/url)
 */
export function lookupRelease(
	catalog: Catalog,
	controllerVersion: string,
	deviceCode: string,
): ReleaseRecord | null {
	const releases = catalog[controllerVersion]
	if (!releases || !Object.hasOwn(releases, deviceCode)) return null

	const record = releases[deviceCode]
	if (!record || !record.version || !record.url) return null

	return record
}

/**
 * Every release of one controller version, in catalog order
 */
export function listReleases(
	catalog: Catalog,
	controllerVersion: string,
): { deviceCode: string; record: ReleaseRecord }[] {
	const releases = catalog[controllerVersion]
	if (!releases) return []
	return Object.entries(releases).map(([deviceCode, record]) => ({
		deviceCode,
		record,
	}))
}

function versionTokens(version: string): string[] {
	return version.match(/\d+|\D+/g) ?? []
}

/**
 * Version-sort ordering: digit runs compare numerically, everything else
 * lexicographically ("7.10.0" > "7.9.5")
 */
export function compareVersions(a: string, b: string): number {
	const left = versionTokens(a)
	const right = versionTokens(b)
	const length = Math.max(left.length, right.length)

	for (let i = 0; i < length; i++) {
		const l = left[i]
		const r = right[i]
		if (l === undefined) return -1
		if (r === undefined) return 1
		if (l === r) continue

		const lNum = /^\d+$/.test(l)
		const rNum = /^\d+$/.test(r)
		if (lNum && rNum) {
			const diff = Number(l) - Number(r)
			if (diff !== 0) return diff < 0 ? -1 : 1
			// "007" vs "7": shorter spelling first
			return l.length < r.length ? -1 : 1
		}
		if (lNum !== rNum) return lNum ? 1 : -1
		return l < r ? -1 : 1
	}

	return 0
}

/**
 * Newest numeric controller-version key, or null when there is none
 */
export function latestControllerVersion(catalog: Catalog): string | null {
	const keys = Object.keys(catalog).filter(key => CONTROLLER_VERSION_KEY.test(key))
	if (keys.length === 0) return null
	return keys.reduce((latest, key) =>
		compareVersions(key, latest) > 0 ? key : latest,
	)
}

/**
 * The configured controller version, or the newest one in the catalog when
 * the configuration says "auto"
 */
export function resolveControllerVersion(
	configured: string | undefined,
	catalog: Catalog,
	catalogPath = "catalog",
): string {
	if (configured && configured !== "auto") {
		return configured
	}

	const latest = latestControllerVersion(catalog)
	if (!latest) {
		throw new FatalError(
			`Cannot auto-detect controller version: no numeric version key in ${catalogPath}`,
		)
	}

	log.catalog.info({ controllerVersion: latest }, "controller version auto-detected")
	return latest
}
