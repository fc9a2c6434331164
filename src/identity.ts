/**
 * Identity resolution: which device code and firmware version a source
 * belongs to, derived from its URL or filename.
 *
 * Priority, highest first:
 *   1. explicit overrides (applied to every source of the run)
 *   2. `/firmware/<CODE>/<VERSION>/<file>` in a URL path
 *   3. a known device-code signature in the filename
 *   4. the first N.N.N or N.N.N.N substring of the filename
 */

import { basename } from "node:path"
import type { Identity, IdentityOverrides } from "./types.js"

const URL_PREFIX = /^https?:\/\//
const URL_AUTHORITY = /^https?:\/\/[^/]*/
const FIRMWARE_PATH = /\/firmware\/([^/]+)\/([^/]+)\/[^/]+$/
const VERSION_IN_NAME = /(\d+\.\d+\.\d+(?:\.\d+)?)/

/** Filename markers for models whose image names embed the code, checked in order */
export const DEVICE_SIGNATURES: readonly { marker: string; deviceCode: string }[] =
	[
		{ marker: "-UAP6MP-", deviceCode: "UAP6MP" },
		{ marker: "-UAPL6-", deviceCode: "UAPL6" },
		{ marker: "-UAL6-", deviceCode: "UAL6" },
		{ marker: "-U7PG2-", deviceCode: "U7PG2" },
	]

export function isUrlSource(source: string): boolean {
	return URL_PREFIX.test(source)
}

/**
 * Path component of a URL with scheme, host, query and fragment removed
 */
export function urlPath(url: string): string {
	return url.replace(URL_AUTHORITY, "").replace(/[?#].*$/, "")
}

/**
 * Filename a source will be cached under
 */
export function sourceFilename(source: string): string {
	if (isUrlSource(source)) {
		const segments = urlPath(source).split("/")
		return segments[segments.length - 1] ?? ""
	}
	return basename(source)
}

/**
 * Run the resolution chain. Either field may come back empty.
 */
export function inferIdentity(
	source: string,
	overrides: IdentityOverrides = {},
): Identity {
	const filename = sourceFilename(source)
	let deviceCode = ""
	let version = ""

	if (isUrlSource(source)) {
		const match = FIRMWARE_PATH.exec(urlPath(source))
		if (match) {
			deviceCode = match[1] ?? ""
			version = match[2] ?? ""
		}
	}

	if (!deviceCode) {
		const signature = DEVICE_SIGNATURES.find(s => filename.includes(s.marker))
		if (signature) deviceCode = signature.deviceCode
	}

	if (!version) {
		const match = VERSION_IN_NAME.exec(filename)
		if (match) version = match[1] ?? ""
	}

	return {
		deviceCode: overrides.deviceCode || deviceCode,
		version: overrides.version || version,
	}
}

/**
 * Resolve a source to a complete identity, or null when either part
 * could not be determined
 */
export function resolveIdentity(
	source: string,
	overrides: IdentityOverrides = {},
): Identity | null {
	const identity = inferIdentity(source, overrides)
	if (!identity.deviceCode || !identity.version) {
		return null
	}
	return identity
}
