/**
 * Unit tests for identity resolution
 */

import { describe, it, expect } from "vitest"
import {
	inferIdentity,
	isUrlSource,
	resolveIdentity,
	sourceFilename,
	urlPath,
} from "../../src/identity.js"

describe("urlPath", () => {
	it("drops scheme, host, query and fragment", () => {
		expect(urlPath("https://dl.example.com:8443/a/b/c.bin?x=1#top")).toBe("/a/b/c.bin")
	})

	it("returns an empty path for a bare host", () => {
		expect(urlPath("http://dl.example.com")).toBe("")
	})
})

describe("sourceFilename", () => {
	it("uses the last URL path segment", () => {
		expect(sourceFilename("https://x/unifi/firmware/UAP6MP/6.7.31.15618/AA.bin?sig=1")).toBe(
			"AA.bin",
		)
	})

	it("uses the basename of a local path", () => {
		expect(sourceFilename("/tmp/downloads/BZ.bin")).toBe("BZ.bin")
	})
})

describe("isUrlSource", () => {
	it("accepts http and https only", () => {
		expect(isUrlSource("https://x/a.bin")).toBe(true)
		expect(isUrlSource("http://x/a.bin")).toBe(true)
		expect(isUrlSource("ftp://x/a.bin")).toBe(false)
		expect(isUrlSource("./a.bin")).toBe(false)
	})
})

describe("inferIdentity", () => {
	// ─────────────────────────────────────────────────────────────────────────
	// Priority
	// ─────────────────────────────────────────────────────────────────────────

	it("prefers the /firmware/<code>/<version>/ URL path over filename signatures", () => {
		const identity = inferIdentity(
			"https://dl.example.com/unifi/firmware/UAL6/6.7.31.15618/BZ.bin",
		)
		expect(identity).toEqual({ deviceCode: "UAL6", version: "6.7.31.15618" })
	})

	it("ignores a conflicting signature in the filename when the URL path matches", () => {
		const identity = inferIdentity(
			"https://dl.example.com/unifi/firmware/UAL6/6.7.31.15618/BZ-U7PG2-6.5.28.bin",
		)
		expect(identity).toEqual({ deviceCode: "UAL6", version: "6.7.31.15618" })
	})

	it("falls back to signature and version in the filename", () => {
		expect(inferIdentity("/srv/fw/BZ.qca956x-UAP6MP-6.6.55.15189.bin")).toEqual({
			deviceCode: "UAP6MP",
			version: "6.6.55.15189",
		})
	})

	it("checks signatures in order", () => {
		expect(inferIdentity("fw-UAPL6-6.5.62.bin").deviceCode).toBe("UAPL6")
		expect(inferIdentity("fw-UAL6-6.5.62.bin").deviceCode).toBe("UAL6")
		expect(inferIdentity("fw-U7PG2-4.3.28.bin").deviceCode).toBe("U7PG2")
	})

	it("takes the first three- or four-part version in the filename", () => {
		expect(inferIdentity("fw-U7PG2-4.3.28.11361-v2.0.1.bin").version).toBe("4.3.28.11361")
		expect(inferIdentity("fw-U7PG2-6.5.62.bin").version).toBe("6.5.62")
	})

	it("uses the filename of a URL without a /firmware/ path", () => {
		expect(inferIdentity("https://mirror.example.com/files/fw-UAL6-6.5.62.bin")).toEqual({
			deviceCode: "UAL6",
			version: "6.5.62",
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Overrides
	// ─────────────────────────────────────────────────────────────────────────

	it("lets overrides win over every inferred value", () => {
		const identity = inferIdentity(
			"https://dl.example.com/unifi/firmware/UAL6/6.7.31.15618/BZ.bin",
			{ deviceCode: "U7PG2", version: "1.2.3" },
		)
		expect(identity).toEqual({ deviceCode: "U7PG2", version: "1.2.3" })
	})

	it("applies a single override and infers the other field", () => {
		expect(inferIdentity("update-6.5.62.bin", { deviceCode: "U7PG2" })).toEqual({
			deviceCode: "U7PG2",
			version: "6.5.62",
		})
	})

	it("treats empty overrides as absent", () => {
		expect(inferIdentity("fw-UAL6-6.5.62.bin", { deviceCode: "", version: "" })).toEqual({
			deviceCode: "UAL6",
			version: "6.5.62",
		})
	})
})

describe("resolveIdentity", () => {
	it("returns null for update.bin without context or overrides", () => {
		expect(resolveIdentity("update.bin")).toBeNull()
		expect(inferIdentity("update.bin")).toEqual({ deviceCode: "", version: "" })
	})

	it("returns null when only the device code is known", () => {
		expect(resolveIdentity("fw-UAL6-latest.bin")).toBeNull()
	})

	it("resolves update.bin once both overrides are set", () => {
		expect(resolveIdentity("update.bin", { deviceCode: "U7PG2", version: "6.7.31.15618" })).toEqual({
			deviceCode: "U7PG2",
			version: "6.7.31.15618",
		})
	})
})
