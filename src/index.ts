// This module is a library entry point
// For CLI usage, run: unifi-fw-cache --help

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./identity.js"
export * from "./catalog.js"
export * from "./hash.js"
export * from "./meta-index.js"
export * from "./ownership.js"
export * from "./placement.js"
export * from "./service.js"
export {
	createHttpFetcher,
	downloadFile,
	rewriteHost,
	type DownloadOptions,
	type DownloadResult,
	type Fetcher,
} from "./download.js"
export * from "./core/index.js"
