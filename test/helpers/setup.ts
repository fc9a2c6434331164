/**
 * Vitest setup file - runs before all tests
 */

// The logger reads LOG_LEVEL at startup, so this must run before any imports
process.env["LOG_LEVEL"] = "silent"

if (process.env["CI"]) {
	process.env["NO_COLOR"] = "1"
}
