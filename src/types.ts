/**
 * Shared type definitions for unifi-fw-cache
 */

import type { ItemError } from "./errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

/** Device code + firmware version pair that decides where a file is cached */
export interface Identity {
	/** Hardware model code, e.g. "UAP6MP" */
	deviceCode: string
	/** Firmware image version, e.g. "6.7.31.15618" */
	version: string
}

/** Forced identity values applied to every source of a run */
export interface IdentityOverrides {
	deviceCode?: string | undefined
	version?: string | undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface ReleaseRecord {
	version: string
	url: string
	/** Catalog-declared MD5 (the `md5sum` field of firmware.json) */
	checksum?: string | undefined
}

/** Device code → release record, in catalog insertion order */
export type ReleaseSet = Record<string, ReleaseRecord>

/** Controller version → release set */
export type Catalog = Record<string, ReleaseSet>

// ─────────────────────────────────────────────────────────────────────────────
// Metadata Index
// ─────────────────────────────────────────────────────────────────────────────

export interface CacheEntry {
	md5: string
	version: string
	size: number
	/** `<deviceCode>/<version>/<filename>`, unique within the index */
	path: string
	devices: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

export type ItemOutcome<T> =
	| { ok: true; value: T }
	| { ok: false; error: ItemError }

export interface ChecksumCheck {
	expected: string
	actual: string
	matches: boolean
}
