/**
 * Ownership and permission enforcement for the controller's storage area
 *
 * In controller mode every file and directory written under the cache root
 * is chowned to the service account; otherwise only the mode is set.
 */

import { chmod, chown, copyFile, mkdir, readdir, rename, rm } from "node:fs/promises"
import { join, relative, resolve, sep } from "node:path"
import { FatalError } from "./errors.js"
import { runCommand } from "./exec.js"

export const FILE_MODE = 0o644
export const DIR_MODE = 0o755

export interface OwnershipPolicy {
	/** Human-readable owner, e.g. "unifi:unifi" or "(unchanged)" */
	readonly owner: string
	apply(path: string, mode: number): Promise<void>
}

/**
 * Sets permissions only; ownership stays with whoever runs the tool
 */
export const modeOnlyPolicy: OwnershipPolicy = {
	owner: "(unchanged)",
	async apply(path, mode) {
		await chmod(path, mode)
	},
}

export function chownPolicy(uid: number, gid: number, owner: string): OwnershipPolicy {
	return {
		owner,
		async apply(path, mode) {
			await chown(path, uid, gid)
			await chmod(path, mode)
		},
	}
}

async function lookupId(
	kind: "user" | "group",
	name: string,
): Promise<number> {
	if (/^\d+$/.test(name)) return Number(name)

	const result =
		kind === "user"
			? await runCommand("id", ["-u", name])
			: await runCommand("getent", ["group", name])

	if (result.code !== 0) {
		throw new FatalError(`Unknown ${kind}: ${name}`)
	}

	// id -u prints the uid; getent prints name:x:gid:members
	const raw =
		kind === "user" ? result.stdout.trim() : result.stdout.trim().split(":")[2]
	if (raw === undefined || !/^\d+$/.test(raw)) {
		throw new FatalError(`Could not determine ${kind} id for ${name}`)
	}
	return Number(raw)
}

/**
 * Resolve user and group names to a chown policy
 */
export async function createOwnerPolicy(
	user: string,
	group: string,
): Promise<OwnershipPolicy> {
	let uid: number
	let gid: number
	try {
		uid = await lookupId("user", user)
		gid = await lookupId("group", group)
	} catch (err) {
		if (err instanceof FatalError) throw err
		throw new FatalError(
			`Cannot resolve ownership ${user}:${group}: ${err instanceof Error ? err.message : String(err)}`,
		)
	}
	return chownPolicy(uid, gid, `${user}:${group}`)
}

/**
 * Create a directory (and missing parents), applying the directory policy to
 * every directory created and to the target itself
 */
export async function ensureDirectory(
	dir: string,
	policy: OwnershipPolicy,
): Promise<void> {
	const target = resolve(dir)
	const firstCreated = await mkdir(target, { recursive: true })

	if (firstCreated !== undefined) {
		const rel = relative(firstCreated, target)
		let current = firstCreated
		await policy.apply(current, DIR_MODE)
		for (const segment of rel ? rel.split(sep) : []) {
			current = join(current, segment)
			await policy.apply(current, DIR_MODE)
		}
		return
	}

	await policy.apply(target, DIR_MODE)
}

/**
 * Install a file: copy to a temp name beside the destination, set
 * ownership/mode, then rename over the destination. Installing a file onto
 * itself only re-applies ownership/mode.
 */
export async function installFile(
	src: string,
	dest: string,
	policy: OwnershipPolicy,
	mode: number = FILE_MODE,
): Promise<void> {
	if (resolve(src) === resolve(dest)) {
		await policy.apply(dest, mode)
		return
	}

	const tmp = `${dest}.tmp-${process.pid}`
	try {
		await copyFile(src, tmp)
		await policy.apply(tmp, mode)
		await rename(tmp, dest)
	} catch (err) {
		await rm(tmp, { force: true })
		throw err
	}
}

/**
 * Apply directory/file modes and ownership to a whole tree
 */
export async function enforceTreeOwnership(
	root: string,
	policy: OwnershipPolicy,
): Promise<{ directories: number; files: number }> {
	const counts = { directories: 0, files: 0 }

	async function walk(dir: string): Promise<void> {
		await policy.apply(dir, DIR_MODE)
		counts.directories++

		const entries = await readdir(dir, { withFileTypes: true })
		for (const entry of entries) {
			const path = join(dir, entry.name)
			if (entry.isDirectory()) {
				await walk(path)
			} else if (entry.isFile()) {
				await policy.apply(path, FILE_MODE)
				counts.files++
			}
		}
	}

	await walk(root)
	return counts
}
