/**
 * Core event types
 *
 * The cache run and the mirror builder are async generators; the CLI
 * subscribes to their events and turns them into terminal output.
 */

import type { ItemErrorKind } from "../errors.js"
import type { CacheEntry, ChecksumCheck } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Cache run
// ─────────────────────────────────────────────────────────────────────────────

export type BatchKind = "catalog" | "source-dir" | "sources" | "pairs"

export interface PlacedItem {
	batch: BatchKind
	source: string
	entry: CacheEntry
	fetched: boolean
}

export interface FailedItem {
	batch: BatchKind
	source: string
	kind: ItemErrorKind
	error: string
}

export interface CacheReport {
	placed: PlacedItem[]
	failed: FailedItem[]
	checksumMismatches: number
}

export type CacheEvent =
	| { type: "index:ready"; path: string; created: boolean }
	| { type: "batch:start"; batch: BatchKind; count: number; label: string }
	| ({ type: "item:placed" } & PlacedItem)
	| ({ type: "item:failed" } & FailedItem)
	| ({
			type: "checksum:mismatch"
			batch: BatchKind
			source: string
			path: string
	  } & Omit<ChecksumCheck, "matches">)
	| { type: "run:complete"; report: CacheReport }

// ─────────────────────────────────────────────────────────────────────────────
// Mirror
// ─────────────────────────────────────────────────────────────────────────────

export type MirrorStatus = "mirrored" | "up-to-date" | "skipped" | "failed"

export interface MirrorItem {
	deviceCode: string
	version: string
	url: string
	/** Destination relative to the mirror root; empty when it could not be derived */
	relativePath: string
	status: MirrorStatus
	error?: string
	checksum?: ChecksumCheck
}

export interface MirrorReport {
	controllerVersion: string
	mirrorRoot: string
	items: MirrorItem[]
	mirrored: number
	upToDate: number
	skipped: number
	failed: number
	checksumMismatches: number
}

export type MirrorEvent =
	| { type: "mirror:start"; controllerVersion: string; mirrorRoot: string; total: number }
	| { type: "item:fetching"; deviceCode: string; version: string; relativePath: string }
	| { type: "item:done"; item: MirrorItem }
	| ({ type: "checksum:mismatch"; relativePath: string } & Omit<ChecksumCheck, "matches">)
	| { type: "mirror:complete"; report: MirrorReport }
