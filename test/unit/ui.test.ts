/**
 * Unit tests for terminal output
 */

import { describe, it, expect, vi, afterEach } from "vitest"
import { logger } from "../../src/logger.js"
import { ui } from "../../src/ui.js"

describe("ui", () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it("writes a warning to stderr once, without a log record", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {})
		const child = vi.spyOn(logger, "child")

		ui.warn("update.bin: could not determine device code, skipped")

		expect(stderr).toHaveBeenCalledTimes(1)
		expect(String(stderr.mock.calls[0]?.[0])).toContain(
			"update.bin: could not determine device code, skipped",
		)
		expect(child).not.toHaveBeenCalled()
	})

	it("writes an error to stderr once, without a log record", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {})
		const child = vi.spyOn(logger, "child")

		ui.error("Catalog not readable: /var/lib/unifi/firmware.json")

		expect(stderr).toHaveBeenCalledTimes(1)
		expect(child).not.toHaveBeenCalled()
	})

	it("reports skipped items in the final status on stderr", () => {
		const stdout = vi.spyOn(console, "log").mockImplementation(() => {})
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {})

		ui.finalStatus(false)

		expect(stdout).toHaveBeenCalledTimes(1)
		expect(String(stderr.mock.calls[0]?.[0])).toContain("Some items failed")
	})
})
