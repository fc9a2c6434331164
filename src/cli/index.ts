#!/usr/bin/env node
/**
 * unifi-fw-cache CLI
 * Offline firmware cache for UniFi controllers, plus a catalog mirror mode
 */

import { join } from "node:path"
import { Command } from "commander"
import { loadCatalog, resolveControllerVersion } from "../catalog.js"
import { isAutoControllerVersion, loadConfig, type Config } from "../config.js"
import {
	collectCacheReport,
	hasCacheWork,
	runCache,
	scanSourceDir,
	type CachePlan,
	type SourcePair,
} from "../core/cache-run.js"
import { mirror } from "../core/mirror.js"
import type {
	BatchKind,
	CacheEvent,
	CacheReport,
	MirrorEvent,
	MirrorReport,
} from "../core/types.js"
import { createHttpFetcher, type Fetcher } from "../download.js"
import {
	EXIT_FATAL,
	EXIT_USAGE,
	FatalError,
	IndexCorruptError,
} from "../errors.js"
import { flushLogs, log } from "../logger.js"
import { META_FILENAME, MetadataIndex } from "../meta-index.js"
import { createOwnerPolicy, enforceTreeOwnership } from "../ownership.js"
import { isRoot, restartService } from "../service.js"
import type { Catalog } from "../types.js"
import { ui } from "../ui.js"
import { extractSourcePairs, parseCodes } from "./args.js"

const VERSION = "1.0.0"

/** Initial retry backoff for downloads, in seconds */
const FETCH_RETRY_DELAY = 2

interface CliOptions {
	fromCatalog: boolean
	codes?: string
	appVersion?: string
	catalog?: string
	srcDir?: string
	mirrorAll: boolean
	mirrorRoot?: string
	rewriteHost?: string
	devFamily?: string
	version?: string
	restart: boolean
}

const BATCH_TAGS: Record<BatchKind, string> = {
	catalog: "CATALOG",
	"source-dir": "FILE",
	sources: "SOURCE",
	pairs: "SRC-URL",
}

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch {
		// exit code stands even if the flush fails
	}
	process.exitCode = code
}

// ─────────────────────────────────────────────────────────────────────────────
// Event output
// ─────────────────────────────────────────────────────────────────────────────

function printCacheEvent(event: CacheEvent): void {
	switch (event.type) {
		case "index:ready":
			if (event.created) ui.info(`Created empty index ${event.path}`)
			break
		case "batch:start":
			ui.header(`${event.label}: ${event.count} item(s)`)
			break
		case "item:placed": {
			const tag = BATCH_TAGS[event.batch]
			const device = event.entry.devices[0] ?? "?"
			const how = event.fetched ? "downloaded" : "installed"
			ui.success(
				`[${tag}] ${device} ${event.entry.version} → ${event.entry.path} (${how}, md5 ${event.entry.md5})`,
			)
			break
		}
		case "item:failed":
			ui.warn(`[${BATCH_TAGS[event.batch]}] ${event.source}: ${event.error}, skipped`)
			break
		case "checksum:mismatch":
			ui.warn(
				`MD5 mismatch for ${event.path} (catalog=${event.expected}, file=${event.actual})`,
			)
			break
		case "run:complete":
			break
	}
}

function printMirrorEvent(event: MirrorEvent): void {
	switch (event.type) {
		case "mirror:start":
			ui.header(
				`Mirroring ${event.total} firmware(s) for controller ${event.controllerVersion} into ${event.mirrorRoot}`,
			)
			break
		case "item:fetching":
			ui.info(`[MIRROR] Downloading ${event.deviceCode} ${event.version} → ${event.relativePath}`)
			break
		case "item:done": {
			const { item } = event
			switch (item.status) {
				case "mirrored":
					ui.success(`[MIRROR] ${item.relativePath}`)
					break
				case "up-to-date":
					ui.info(`[MIRROR] Already present: ${item.relativePath}, skipped`)
					break
				case "skipped":
					ui.warn(`[MIRROR] ${item.deviceCode}: ${item.error ?? "skipped"}`)
					break
				case "failed":
					ui.error(`[MIRROR] ${item.deviceCode} ${item.url}: ${item.error ?? "failed"}`)
					break
			}
			break
		}
		case "checksum:mismatch":
			ui.warn(
				`[MIRROR] MD5 mismatch for ${event.relativePath} (catalog=${event.expected}, file=${event.actual})`,
			)
			break
		case "mirror:complete":
			break
	}
}

function printCacheSummary(report: CacheReport, config: Config): void {
	console.log()
	ui.summarySection(
		"Cached",
		report.placed.map(p => p.entry.path),
		"green",
	)
	ui.summarySection(
		"Skipped",
		report.failed.map(f => `${f.source} (${f.kind}): ${f.error}`),
		"red",
	)
	ui.info(`Index: ${join(config.cacheRoot, META_FILENAME)} | Cache: ${config.cacheRoot}`)
	ui.info(
		"If the controller UI does not show the cache, check: grep -i firmware_meta /usr/lib/unifi/logs/server.log | tail -n 50",
	)
}

function printMirrorSummary(report: MirrorReport): void {
	ui.success(
		`Mirror complete: ${report.mirrorRoot} (${report.mirrored} downloaded, ${report.upToDate} already present, ${report.skipped} skipped, ${report.failed} failed)`,
	)
}

// ─────────────────────────────────────────────────────────────────────────────
// Run
// ─────────────────────────────────────────────────────────────────────────────

async function runController(
	plan: CachePlan,
	config: Config,
	fetcher: Fetcher,
): Promise<CacheReport> {
	const ownership = await createOwnerPolicy(config.ownerUser, config.ownerGroup)
	const index = new MetadataIndex(config.cacheRoot, ownership)

	const report = await collectCacheReport(
		runCache(plan, {
			cacheRoot: config.cacheRoot,
			overrides: {
				deviceCode: config.deviceCodeOverride,
				version: config.versionOverride,
			},
			ownership,
			index,
			fetcher,
		}),
		printCacheEvent,
	)

	const counts = await enforceTreeOwnership(config.cacheRoot, ownership)
	log.cli.info({ ...counts, owner: ownership.owner }, "cache ownership enforced")

	if (config.restartAfter) {
		const restart = await restartService(config.serviceName)
		if (restart.success) {
			ui.success(`Restarted ${config.serviceName}`)
		} else {
			ui.warn(`Could not restart ${config.serviceName}: ${restart.error ?? "unknown error"}`)
		}
	}

	printCacheSummary(report, config)
	return report
}

async function run(
	sources: string[],
	options: CliOptions,
	pairs: SourcePair[],
	command: Command,
): Promise<void> {
	const config = loadConfig({
		overrides: {
			catalogPath: options.catalog,
			controllerVersion: options.appVersion,
			deviceCodeOverride: options.devFamily,
			versionOverride: options.version,
			hostRewrite: options.rewriteHost,
			mirrorRoot: options.mirrorRoot,
			restartAfter:
				command.getOptionValueSource("restart") === "cli" ? options.restart : undefined,
		},
	})

	const codes = parseCodes(options.codes)
	if (options.fromCatalog && codes.length === 0) {
		throw new FatalError(`--from-catalog requires --codes "CODE ..."`, EXIT_USAGE)
	}

	const plan: CachePlan = {
		sourceDir: options.srcDir,
		sources: sources.filter(s => s !== ""),
		pairs,
	}
	const controllerMode = options.fromCatalog || hasCacheWork(plan)

	if (!controllerMode && !options.mirrorAll) {
		command.outputHelp()
		await exitWithCode(EXIT_USAGE)
		return
	}

	if (controllerMode && !isRoot()) {
		throw new FatalError(
			`Controller mode needs root (writes to ${config.cacheRoot} and restarts ${config.serviceName})`,
		)
	}

	if (plan.sourceDir !== undefined) {
		// Fail before any other batch runs
		scanSourceDir(plan.sourceDir)
	}

	let catalog: Catalog | undefined
	let controllerVersion: string | undefined
	if (options.fromCatalog || options.mirrorAll) {
		catalog = loadCatalog(config.catalogPath)
		controllerVersion = resolveControllerVersion(
			config.controllerVersion,
			catalog,
			config.catalogPath,
		)
		if (isAutoControllerVersion(config)) {
			ui.info(`Controller version auto-detected as ${controllerVersion}`)
		}
		if (options.fromCatalog) {
			plan.catalog = { catalog, controllerVersion, codes }
		}
	}

	const fetcher = createHttpFetcher({
		retries: config.fetchRetries,
		delay: FETCH_RETRY_DELAY,
		timeoutMs: config.fetchTimeoutSeconds * 1000,
		rewriteHost: config.hostRewrite,
	})

	let failures = 0

	if (controllerMode) {
		const report = await runController(plan, config, fetcher)
		failures += report.failed.length
	}

	if (options.mirrorAll && catalog && controllerVersion) {
		const report = await mirror(
			catalog,
			controllerVersion,
			config.mirrorRoot,
			fetcher,
			printMirrorEvent,
		)
		printMirrorSummary(report)
		failures += report.failed
	}

	// Skipped items are reported above; they leave the exit status at 0
	ui.finalStatus(failures === 0)
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

let sourcePairs: SourcePair[] = []

const program = new Command()

program
	.name("unifi-fw-cache")
	.version(VERSION, "-V, --cli-version", "Print the unifi-fw-cache version")
	.description(
		"Offline firmware cache for UniFi controllers, and a mirror of the firmware catalog",
	)
	.argument("[sources...]", "Firmware URLs or local files to cache")
	.option("--from-catalog", "Cache firmware listed in the catalog for --codes", false)
	.option("--codes <codes>", 'Device codes, e.g. "U7PG2 UAP6MP UAL6"')
	.option("--app-version <version>", "Controller version key in the catalog (default: auto)")
	.option("--catalog <path>", "Path to firmware.json")
	.option("--src-dir <path>", "Cache every *.bin/*.tar in a local directory")
	.option("--mirror-all", "Download every catalog firmware into a mirror tree", false)
	.option("--mirror-root <path>", "Mirror root directory")
	.option("--rewrite-host <host>", "Replace the URL host when downloading (path kept)")
	.option("--dev-family <code>", "Force the device code for every file/URL")
	.option("--version <version>", "Force the firmware version for every file/URL")
	.option("--no-restart", "Do not restart the controller service")
	.addHelpText(
		"after",
		`
Source URL for a local file:
  --src-url <url> [file]   take device code/version/filename from <url>, content from
                           [file] (or from the last file argument before the option)

Environment:
  UNIFI_FW_DIR, CATALOG, APP_VERSION, DEV_FAMILY, VERSION, UNIFI_USER, UNIFI_GROUP,
  RESTART, REWRITE_HOST, MIRROR_ROOT, UNIFI_SERVICE, FETCH_RETRIES, FETCH_TIMEOUT`,
	)
	.action(async (sources: string[], _options: unknown, command: Command) => {
		await run(sources, command.opts<CliOptions>(), sourcePairs, command)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
	try {
		const { argv, pairs } = extractSourcePairs(process.argv.slice(2))
		sourcePairs = pairs
		await program.parseAsync(argv, { from: "user" })
	} catch (err) {
		if (err instanceof FatalError) {
			ui.error(err.message)
			await exitWithCode(err.exitCode)
			return
		}
		if (err instanceof IndexCorruptError) {
			ui.error(`${err.message}. Restore it from the newest ${err.indexPath}.bak.* file.`)
			await exitWithCode(EXIT_FATAL)
			return
		}
		throw err
	}
}

main().catch(async (err: unknown) => {
	log.cli.fatal({ err }, "unexpected failure")
	ui.error(err instanceof Error ? err.message : String(err))
	await exitWithCode(EXIT_FATAL)
})
