/**
 * Argument handling commander cannot express
 *
 * `--src-url URL` binds to a local file by position: the argument right
 * after the URL when it is a file, otherwise the last file argument seen
 * before the option. The pairs are pulled out before commander parses the
 * rest.
 */

import type { SourcePair } from "../core/cache-run.js"
import { EXIT_USAGE, FatalError } from "../errors.js"
import { isUrlSource } from "../identity.js"

export const SRC_URL_OPTION = "--src-url"

/** Options that consume the following argument as their value */
export const VALUE_OPTIONS: ReadonlySet<string> = new Set([
	"--codes",
	"--app-version",
	"--catalog",
	"--src-dir",
	"--mirror-root",
	"--rewrite-host",
	"--dev-family",
	"--version",
])

export interface ExtractedArgs {
	/** Remaining arguments for commander */
	argv: string[]
	pairs: SourcePair[]
}

export function extractSourcePairs(args: readonly string[]): ExtractedArgs {
	const argv: string[] = []
	const pairs: SourcePair[] = []
	// Index in argv of the most recent local-file positional, -1 when none
	let lastFile = -1
	let positionalOnly = false

	const pushPositional = (value: string) => {
		argv.push(value)
		lastFile = isUrlSource(value) ? -1 : argv.length - 1
	}

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? ""

		if (positionalOnly) {
			pushPositional(arg)
			continue
		}

		if (arg === "--") {
			argv.push(arg)
			positionalOnly = true
			continue
		}

		if (arg === SRC_URL_OPTION || arg.startsWith(`${SRC_URL_OPTION}=`)) {
			const url =
				arg === SRC_URL_OPTION ? args[++i] : arg.slice(SRC_URL_OPTION.length + 1)
			if (!url) {
				throw new FatalError(`${SRC_URL_OPTION} requires a URL`, EXIT_USAGE)
			}

			const next = args[i + 1]
			if (next !== undefined && !next.startsWith("-") && !isUrlSource(next)) {
				pairs.push({ url, path: next })
				i++
				continue
			}

			const previous = lastFile >= 0 ? argv[lastFile] : undefined
			if (previous === undefined) {
				throw new FatalError(
					`${SRC_URL_OPTION} ${url}: no local file given after the option or before it`,
					EXIT_USAGE,
				)
			}
			pairs.push({ url, path: previous })
			argv.splice(lastFile, 1)
			lastFile = -1
			continue
		}

		if (VALUE_OPTIONS.has(arg)) {
			argv.push(arg)
			const value = args[i + 1]
			if (value !== undefined) {
				argv.push(value)
				i++
			}
			continue
		}

		if (arg.startsWith("-")) {
			argv.push(arg)
			continue
		}

		pushPositional(arg)
	}

	return { argv, pairs }
}

/**
 * Device codes from `--codes`, separated by spaces and/or commas
 */
export function parseCodes(value: string | undefined): string[] {
	if (!value) return []
	return value
		.split(/[\s,]+/)
		.map(code => code.trim())
		.filter(code => code !== "")
}
