/**
 * HTTP fetch collaborator with retry, timeouts and Range resume
 *
 * - Streams to a .part file beside the destination
 * - Resumes from an existing .part file with a Range request
 * - Renames to the destination only once the transfer is complete
 * - Optional host rewrite (mirror host) applied before dispatch
 */

import { createWriteStream, existsSync, renameSync, statSync, unlinkSync } from "node:fs"
import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { Agent, fetch as undiciFetch } from "undici"
import { log } from "./logger.js"

const USER_AGENT = "unifi-fw-cache/1.0.0"

export interface DownloadOptions {
	/** Total attempts, including the first */
	retries: number
	/** Initial backoff in seconds, doubled after every failed attempt */
	delay: number
	/** Connect, headers and body-idle timeout */
	timeoutMs: number
	/** Replacement for the URL's authority (host[:port]) */
	rewriteHost?: string | undefined
}

export interface DownloadResult {
	success: boolean
	/** URL actually requested, after host rewrite */
	url: string
	bytesDownloaded: number
	resumed: boolean
	error?: string
}

/**
 * Collaborator contract: fetch `url` into `destPath` or throw
 */
export type Fetcher = (url: string, destPath: string) => Promise<DownloadResult>

/**
 * Replace the authority of a URL, leaving scheme and path as is
 */
export function rewriteHost(url: string, host: string | undefined): string {
	if (!host) return url
	return url.replace(/^(https?:\/\/)[^/]+/, `$1${host}`)
}

function getPartPath(destPath: string): string {
	return `${destPath}.part`
}

function getPartialSize(partPath: string): number {
	return existsSync(partPath) ? statSync(partPath).size : 0
}

function cleanupPartFile(partPath: string): void {
	if (existsSync(partPath)) {
		unlinkSync(partPath)
	}
}

function failure(url: string, error: string): DownloadResult {
	return { success: false, url, bytesDownloaded: 0, resumed: false, error }
}

/**
 * Download a file with retry logic, streaming, and Range resume support
 */
export async function downloadFile(
	sourceUrl: string,
	destPath: string,
	options: DownloadOptions,
	dispatcher?: Agent,
): Promise<DownloadResult> {
	const { retries, delay, timeoutMs } = options
	const url = rewriteHost(sourceUrl, options.rewriteHost)
	const partPath = getPartPath(destPath)
	const agent =
		dispatcher ??
		new Agent({
			connectTimeout: timeoutMs,
			headersTimeout: timeoutMs,
			bodyTimeout: timeoutMs,
		})

	await mkdir(dirname(destPath), { recursive: true })

	let attempt = 1
	let currentDelay = delay * 1000

	try {
		while (attempt <= retries) {
			try {
				const existingSize = getPartialSize(partPath)
				const headers: Record<string, string> = {
					"User-Agent": USER_AGENT,
				}

				if (existingSize > 0) {
					headers["Range"] = `bytes=${existingSize}-`
				}

				const response = await undiciFetch(url, { headers, dispatcher: agent })

				if (response.status === 404) {
					// Not found - don't retry
					cleanupPartFile(partPath)
					return failure(url, "Not found (404)")
				}

				if (response.status === 416) {
					// Range not satisfiable: stale partial, start over
					cleanupPartFile(partPath)
					throw new Error("Range not satisfiable (416)")
				}

				if (!response.ok) {
					throw new Error(`HTTP ${response.status}: ${response.statusText}`)
				}

				if (!response.body) {
					throw new Error("No response body")
				}

				const isResume = response.status === 206
				let totalSize: number | undefined
				if (isResume) {
					const contentRange = response.headers.get("Content-Range")
					const match = contentRange?.match(/bytes \d+-\d+\/(\d+)/)
					if (match && match[1]) {
						totalSize = parseInt(match[1], 10)
					}
				} else {
					const contentLength = response.headers.get("Content-Length")
					if (contentLength) {
						totalSize = parseInt(contentLength, 10)
					}
					cleanupPartFile(partPath)
				}

				const fileStream = createWriteStream(partPath, {
					flags: isResume ? "a" : "w",
				})
				await pipeline(Readable.fromWeb(response.body as never), fileStream)

				const finalSize = statSync(partPath).size
				if (finalSize === 0) {
					cleanupPartFile(partPath)
					throw new Error("Downloaded file is empty")
				}

				if (totalSize !== undefined && finalSize !== totalSize) {
					// Truncated: keep .part for the next attempt to resume
					throw new Error(`Size mismatch: expected ${totalSize}, got ${finalSize}`)
				}

				if (existsSync(destPath)) {
					unlinkSync(destPath)
				}
				renameSync(partPath, destPath)

				const bytesDownloaded = isResume ? finalSize - existingSize : finalSize
				log.download.debug({ url, destPath, bytesDownloaded, isResume }, "downloaded")
				return { success: true, url, bytesDownloaded, resumed: isResume }
			} catch (err) {
				const message = err instanceof Error ? err.message : String(err)
				log.download.warn({ url, attempt, retries, error: message }, "download attempt failed")

				if (attempt >= retries) {
					return failure(url, message)
				}

				// Exponential backoff, capped at 30s
				await sleep(Math.min(currentDelay, 30000))
				currentDelay *= 2
				attempt++
			}
		}
	} finally {
		if (!dispatcher) {
			await agent.close()
		}
	}

	return failure(url, "Max retries exceeded")
}

/**
 * Fetcher backed by downloadFile; a failed download becomes an Error
 */
export function createHttpFetcher(options: DownloadOptions): Fetcher {
	return async (url, destPath) => {
		const result = await downloadFile(url, destPath, options)
		if (!result.success) {
			throw new Error(`Download failed for ${result.url}: ${result.error ?? "unknown error"}`)
		}
		return result
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms))
}
