/**
 * Unit tests for catalog decoding, lookup and controller-version detection
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
	compareVersions,
	latestControllerVersion,
	listReleases,
	loadCatalog,
	lookupRelease,
	parseCatalog,
	resolveControllerVersion,
} from "../../src/catalog.js"
import { FatalError } from "../../src/errors.js"

const DOC = {
	"7.2.1": {
		release: {
			U7PG2: { version: "4.3.28.11361", url: "https://x/unifi/firmware/U7PG2/4.3.28.11361/a.bin" },
		},
	},
	"7.10.0": {
		release: {
			UAP6MP: {
				version: "6.7.31.15618",
				url: "https://x/unifi/firmware/UAP6MP/6.7.31.15618/AA.bin",
				md5sum: " ABC123 ",
			},
			UAL6: { version: "", url: "https://x/unifi/firmware/UAL6/1.0.0/b.bin" },
		},
	},
	"7.9.5": { release: {} },
	beta: { release: {} },
}

describe("parseCatalog", () => {
	it("flattens release sets and maps md5sum to checksum", () => {
		const catalog = parseCatalog(DOC)
		expect(catalog["7.10.0"]?.["UAP6MP"]).toEqual({
			version: "6.7.31.15618",
			url: "https://x/unifi/firmware/UAP6MP/6.7.31.15618/AA.bin",
			checksum: "ABC123",
		})
	})

	it("defaults a missing release object to an empty set", () => {
		expect(parseCatalog({ "8.0.0": {} })).toEqual({ "8.0.0": {} })
	})

	it("skips a malformed record and keeps the rest of the release set", () => {
		const catalog = parseCatalog({
			"7.10.0": {
				release: {
					UAL6: { url: 5 },
					U7PG2: { version: "4.3.28.11361", url: "https://x/a.bin" },
				},
			},
		})
		expect(lookupRelease(catalog, "7.10.0", "UAL6")).toBeNull()
		expect(lookupRelease(catalog, "7.10.0", "U7PG2")).toEqual({
			version: "4.3.28.11361",
			url: "https://x/a.bin",
			checksum: undefined,
		})
	})

	it("accepts null fields in a record", () => {
		const catalog = parseCatalog({
			"7.10.0": {
				release: {
					UAP6MP: { version: "6.7.31.15618", url: "https://x/AA.bin", md5sum: null },
					UAL6: { version: null, url: "https://x/b.bin" },
				},
			},
		})
		expect(lookupRelease(catalog, "7.10.0", "UAP6MP")?.checksum).toBeUndefined()
		expect(catalog["7.10.0"]?.["UAL6"]).toEqual({
			version: "",
			url: "https://x/b.bin",
			checksum: undefined,
		})
		expect(lookupRelease(catalog, "7.10.0", "UAL6")).toBeNull()
	})

	it("ignores top-level values that are not release sets", () => {
		const catalog = parseCatalog({
			"7.10.0": { release: { U7PG2: { version: "4.3.28.11361", url: "https://x/a.bin" } } },
			generated_at: "2024-01-01",
			"7.11.0": null,
			"7.12.0": { release: [] },
		})
		expect(Object.keys(catalog)).toEqual(["7.10.0"])
		expect(latestControllerVersion(catalog)).toBe("7.10.0")
	})

	it("rejects a non-object document", () => {
		expect(() => parseCatalog([1, 2])).toThrow(FatalError)
	})
})

describe("lookupRelease", () => {
	const catalog = parseCatalog(DOC)

	it("returns the record for a present code", () => {
		expect(lookupRelease(catalog, "7.2.1", "U7PG2")?.version).toBe("4.3.28.11361")
	})

	it("returns null for an absent code or controller version", () => {
		expect(lookupRelease(catalog, "7.10.0", "U7PG2")).toBeNull()
		expect(lookupRelease(catalog, "6.0.0", "UAP6MP")).toBeNull()
	})

	it("returns null when the record has an empty version", () => {
		expect(lookupRelease(catalog, "7.10.0", "UAL6")).toBeNull()
	})

	it("does not treat inherited object keys as device codes", () => {
		expect(lookupRelease(catalog, "7.10.0", "toString")).toBeNull()
	})
})

describe("listReleases", () => {
	it("lists releases in catalog order", () => {
		const catalog = parseCatalog(DOC)
		expect(listReleases(catalog, "7.10.0").map(r => r.deviceCode)).toEqual(["UAP6MP", "UAL6"])
		expect(listReleases(catalog, "1.0.0")).toEqual([])
	})
})

describe("compareVersions", () => {
	it("compares numeric components numerically", () => {
		expect(compareVersions("7.10.0", "7.9.5")).toBe(1)
		expect(compareVersions("7.2.1", "7.10.0")).toBe(-1)
		expect(compareVersions("8.0.7", "8.0.7")).toBe(0)
	})

	it("orders a prefix before its extension", () => {
		expect(compareVersions("7.10", "7.10.0")).toBe(-1)
	})
})

describe("latestControllerVersion", () => {
	it("picks the numerically newest key", () => {
		const catalog = parseCatalog({
			"7.2.1": { release: {} },
			"7.10.0": { release: {} },
			"7.9.5": { release: {} },
		})
		expect(latestControllerVersion(catalog)).toBe("7.10.0")
	})

	it("ignores keys that are not version-shaped", () => {
		expect(latestControllerVersion(parseCatalog({ beta: {}, "7.2.1": {} }))).toBe("7.2.1")
		expect(latestControllerVersion(parseCatalog({ beta: {} }))).toBeNull()
	})
})

describe("resolveControllerVersion", () => {
	const catalog = parseCatalog(DOC)

	it("auto-detects the newest controller version", () => {
		expect(resolveControllerVersion("auto", catalog)).toBe("7.10.0")
		expect(resolveControllerVersion(undefined, catalog)).toBe("7.10.0")
	})

	it("keeps an explicit version", () => {
		expect(resolveControllerVersion("7.2.1", catalog)).toBe("7.2.1")
	})

	it("fails when auto-detection finds no version key", () => {
		expect(() => resolveControllerVersion("auto", parseCatalog({ beta: {} }), "fw.json")).toThrow(
			"Cannot auto-detect controller version: no numeric version key in fw.json",
		)
	})
})

describe("loadCatalog", () => {
	let dir: string

	beforeAll(() => {
		dir = mkdtempSync(join(tmpdir(), "unifi-fw-cache-catalog-"))
	})

	afterAll(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	it("reads and decodes a catalog file", () => {
		const path = join(dir, "firmware.json")
		writeFileSync(path, JSON.stringify(DOC))
		expect(Object.keys(loadCatalog(path))).toEqual(["7.2.1", "7.10.0", "7.9.5", "beta"])
	})

	it("fails on a missing file", () => {
		expect(() => loadCatalog(join(dir, "missing.json"))).toThrow(/Catalog not readable/)
	})

	it("fails on invalid JSON", () => {
		const path = join(dir, "broken.json")
		writeFileSync(path, "{ not json")
		expect(() => loadCatalog(path)).toThrow(/Catalog is not valid JSON/)
	})
})
