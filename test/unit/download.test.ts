/**
 * Unit tests for the HTTP fetcher against an in-process server
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest"
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http"
import { existsSync } from "node:fs"
import { readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { createHttpFetcher, downloadFile, rewriteHost } from "../../src/download.js"
import { withTempDir } from "../helpers/index.js"

const BODY = "hello"

interface SeenRequest {
	url: string
	range: string | undefined
}

describe("rewriteHost", () => {
	it("replaces the authority and keeps the path", () => {
		expect(rewriteHost("https://dl.example.com/unifi/firmware/a.bin?x=1", "mirror.local:8080")).toBe(
			"https://mirror.local:8080/unifi/firmware/a.bin?x=1",
		)
	})

	it("leaves the URL alone without a host", () => {
		expect(rewriteHost("https://dl.example.com/a.bin", undefined)).toBe(
			"https://dl.example.com/a.bin",
		)
	})
})

describe("downloadFile", () => {
	let server: Server
	let base: string
	let seen: SeenRequest[] = []

	function handle(req: IncomingMessage, res: ServerResponse): void {
		const range = req.headers.range
		seen.push({ url: req.url ?? "", range })

		switch (req.url) {
			case "/fw/a.bin": {
				const match = range ? /^bytes=(\d+)-$/.exec(range) : null
				if (match) {
					const start = Number(match[1])
					res.writeHead(206, {
						"Content-Range": `bytes ${start}-${BODY.length - 1}/${BODY.length}`,
						"Content-Length": String(BODY.length - start),
					})
					res.end(BODY.slice(start))
					return
				}
				res.writeHead(200, { "Content-Length": String(BODY.length) })
				res.end(BODY)
				return
			}
			case "/fw/empty.bin":
				res.writeHead(200, { "Content-Length": "0" })
				res.end()
				return
			case "/fw/broken.bin":
				res.writeHead(500)
				res.end()
				return
			default:
				res.writeHead(404)
				res.end()
		}
	}

	beforeAll(async () => {
		server = createServer(handle)
		await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve))
		const address = server.address()
		if (address === null || typeof address === "string") {
			throw new Error("test server has no TCP address")
		}
		base = `http://127.0.0.1:${address.port}`
	})

	afterAll(async () => {
		server.closeAllConnections()
		await new Promise<void>(resolve => server.close(() => resolve()))
	})

	beforeEach(() => {
		seen = []
	})

	const options = { retries: 1, delay: 0, timeoutMs: 5000 }

	it("downloads to the destination without leaving a .part file", async () => {
		await withTempDir(async dir => {
			const dest = join(dir, "sub", "a.bin")
			const result = await downloadFile(`${base}/fw/a.bin`, dest, options)

			expect(result).toEqual({
				success: true,
				url: `${base}/fw/a.bin`,
				bytesDownloaded: 5,
				resumed: false,
			})
			expect(await readFile(dest, "utf8")).toBe(BODY)
			expect(existsSync(`${dest}.part`)).toBe(false)
		})
	})

	it("resumes from an existing .part file with a Range request", async () => {
		await withTempDir(async dir => {
			const dest = join(dir, "a.bin")
			await writeFile(`${dest}.part`, "hel")

			const result = await downloadFile(`${base}/fw/a.bin`, dest, options)

			expect(seen).toEqual([{ url: "/fw/a.bin", range: "bytes=3-" }])
			expect(result.resumed).toBe(true)
			expect(result.bytesDownloaded).toBe(2)
			expect(await readFile(dest, "utf8")).toBe(BODY)
		})
	})

	it("does not retry a 404", async () => {
		await withTempDir(async dir => {
			const result = await downloadFile(`${base}/fw/missing.bin`, join(dir, "m.bin"), {
				...options,
				retries: 3,
			})

			expect(result.success).toBe(false)
			expect(result.error).toBe("Not found (404)")
			expect(seen).toHaveLength(1)
		})
	})

	it("retries server errors up to the attempt limit", async () => {
		await withTempDir(async dir => {
			const result = await downloadFile(`${base}/fw/broken.bin`, join(dir, "b.bin"), {
				...options,
				retries: 2,
			})

			expect(result.success).toBe(false)
			expect(result.error).toBe("HTTP 500: Internal Server Error")
			expect(seen).toHaveLength(2)
		})
	})

	it("treats an empty body as a failure", async () => {
		await withTempDir(async dir => {
			const dest = join(dir, "e.bin")
			const result = await downloadFile(`${base}/fw/empty.bin`, dest, options)

			expect(result.error).toBe("Downloaded file is empty")
			expect(existsSync(dest)).toBe(false)
		})
	})

	it("sends the request to the rewritten host", async () => {
		await withTempDir(async dir => {
			const dest = join(dir, "a.bin")
			const host = base.replace("http://", "")
			const result = await downloadFile("http://dl.example.invalid/fw/a.bin", dest, {
				...options,
				rewriteHost: host,
			})

			expect(result.url).toBe(`${base}/fw/a.bin`)
			expect(await readFile(dest, "utf8")).toBe(BODY)
		})
	})

	it("createHttpFetcher throws on failure", async () => {
		await withTempDir(async dir => {
			const fetcher = createHttpFetcher(options)
			await expect(fetcher(`${base}/fw/missing.bin`, join(dir, "m.bin"))).rejects.toThrow(
				`Download failed for ${base}/fw/missing.bin: Not found (404)`,
			)
		})
	})
})
