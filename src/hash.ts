/**
 * File hashing and checksum verification
 * MD5 is what the controller's catalog and firmware_meta.json carry
 */

import { createReadStream, existsSync } from "node:fs"
import { createHash } from "node:crypto"
import type { ChecksumCheck } from "./types.js"

export interface FileHash {
	md5: string
	size: number
}

/**
 * Calculate MD5 and byte size of a file
 * Uses streaming to handle large firmware images
 */
export async function hashFile(filePath: string): Promise<FileHash> {
	if (!existsSync(filePath)) {
		throw new Error(`File not found: ${filePath}`)
	}

	const md5Hash = createHash("md5")
	let size = 0

	const stream = createReadStream(filePath)

	for await (const chunk of stream) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
		md5Hash.update(buffer)
		size += buffer.length
	}

	return {
		md5: md5Hash.digest("hex"),
		size,
	}
}

/**
 * Compare a file against a catalog checksum. Case-insensitive, since
 * catalogs are not consistent about hex casing.
 */
export async function verifyChecksum(
	filePath: string,
	expected: string,
): Promise<ChecksumCheck & { hash: FileHash }> {
	const hash = await hashFile(filePath)
	const normalized = expected.trim().toLowerCase()

	return {
		expected: normalized,
		actual: hash.md5,
		matches: hash.md5 === normalized,
		hash,
	}
}
