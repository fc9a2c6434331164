/**
 * Configuration management with Zod validation
 *
 * Layers, lowest first: defaults, rc file, environment, CLI flags.
 * The result is frozen and passed explicitly to every component.
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { FatalError } from "./errors.js"

const booleanish = z.union([
	z.boolean(),
	z
		.string()
		.trim()
		.toLowerCase()
		.refine(v => ["1", "0", "true", "false", "yes", "no"].includes(v), {
			message: "expected 1/0, true/false or yes/no",
		})
		.transform(v => v === "1" || v === "true" || v === "yes"),
])

const optionalText = z
	.string()
	.trim()
	.optional()
	.transform(v => (v ? v : undefined))

const ConfigSchema = z.object({
	cacheRoot: z.string().min(1).default("/var/lib/unifi/firmware"),
	catalogPath: z.string().min(1).default("/var/lib/unifi/firmware.json"),
	/** "auto" (or empty) selects the newest controller version in the catalog */
	controllerVersion: z
		.string()
		.trim()
		.default("auto")
		.transform(v => (v === "" ? "auto" : v)),
	deviceCodeOverride: optionalText,
	versionOverride: optionalText,
	ownerUser: z.string().min(1).default("unifi"),
	ownerGroup: z.string().min(1).default("unifi"),
	restartAfter: booleanish.default(true),
	hostRewrite: optionalText,
	mirrorRoot: z.string().min(1).default("."),
	serviceName: z.string().min(1).default("unifi"),
	fetchRetries: z.coerce.number().int().min(1).max(10).default(3),
	fetchTimeoutSeconds: z.coerce.number().int().min(1).max(3600).default(30),
})

export type Config = Readonly<z.output<typeof ConfigSchema>>
export type ConfigInput = z.input<typeof ConfigSchema>

/** Environment variable → config field */
const ENV_KEYS: Record<string, keyof ConfigInput> = {
	UNIFI_FW_DIR: "cacheRoot",
	CATALOG: "catalogPath",
	APP_VERSION: "controllerVersion",
	DEV_FAMILY: "deviceCodeOverride",
	VERSION: "versionOverride",
	UNIFI_USER: "ownerUser",
	UNIFI_GROUP: "ownerGroup",
	RESTART: "restartAfter",
	REWRITE_HOST: "hostRewrite",
	MIRROR_ROOT: "mirrorRoot",
	UNIFI_SERVICE: "serviceName",
	FETCH_RETRIES: "fetchRetries",
	FETCH_TIMEOUT: "fetchTimeoutSeconds",
}

export const RC_FILENAMES = [".unifi-fw-cacherc", ".unifi-fw-cacherc.json"]

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv
	/** Values from CLI flags; undefined entries are ignored */
	overrides?: Partial<Record<keyof ConfigInput, string | boolean | number | undefined>>
	/** Directories searched for an rc file, in order */
	rcDirs?: string[]
}

export function configFromEnv(
	env: NodeJS.ProcessEnv,
): Partial<Record<keyof ConfigInput, string>> {
	const values: Partial<Record<keyof ConfigInput, string>> = {}
	for (const [name, key] of Object.entries(ENV_KEYS)) {
		const value = env[name]
		if (value !== undefined) {
			values[key] = value
		}
	}
	return values
}

/**
 * Read the first rc file found (JSON object with config field names)
 */
export function readRcFile(dirs: string[]): Record<string, unknown> {
	for (const dir of dirs) {
		for (const name of RC_FILENAMES) {
			const path = join(dir, name)
			if (!existsSync(path)) continue

			let parsed: unknown
			try {
				parsed = JSON.parse(readFileSync(path, "utf-8"))
			} catch (err) {
				throw new FatalError(
					`Invalid config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
				)
			}
			if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
				throw new FatalError(`Invalid config file ${path}: expected a JSON object`)
			}
			return { ...parsed }
		}
	}
	return {}
}

function definedOnly(values: object): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(values).filter(([, v]) => v !== undefined),
	)
}

/**
 * Build the run configuration once at startup
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
	const env = options.env ?? process.env
	const rcDirs = options.rcDirs ?? [process.cwd(), homedir()]

	const merged = {
		...readRcFile(rcDirs),
		...configFromEnv(env),
		...definedOnly(options.overrides ?? {}),
	}

	const result = ConfigSchema.safeParse(merged)
	if (!result.success) {
		const issues = result.error.issues
			.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ")
		throw new FatalError(`Invalid configuration: ${issues}`)
	}

	return Object.freeze(result.data)
}

export function isAutoControllerVersion(config: Config): boolean {
	return config.controllerVersion === "auto"
}
