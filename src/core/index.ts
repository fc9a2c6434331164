/**
 * Core module exports
 *
 * Cache runs and mirror builds as async generators. The CLI consumes their
 * events; library users can drain them into reports instead.
 */

// Cache run
export {
	runCache,
	collectCacheReport,
	scanSourceDir,
	hasCacheWork,
	SOURCE_DIR_EXTENSIONS,
} from "./cache-run.js"
export type { CachePlan, CatalogRequest, SourcePair } from "./cache-run.js"

// Mirror builder
export { mirror, mirrorCatalog, mirrorPath } from "./mirror.js"

// Shared types
export type {
	BatchKind,
	CacheEvent,
	CacheReport,
	FailedItem,
	MirrorEvent,
	MirrorItem,
	MirrorReport,
	MirrorStatus,
	PlacedItem,
} from "./types.js"
