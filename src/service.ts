/**
 * Controller service lifecycle and privilege checks
 */

import { runCommand } from "./exec.js"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

export function isRoot(): boolean {
	return typeof process.getuid === "function" && process.getuid() === 0
}

/**
 * Restart the controller so it rereads firmware_meta.json. Best-effort:
 * failures are returned, never thrown.
 */
export async function restartService(
	name: string,
): Promise<{ success: boolean; error?: string }> {
	try {
		const result = await runCommand("systemctl", ["restart", name])
		if (result.code === 0) {
			log.service.info({ service: name }, "service restarted")
			return { success: true }
		}
		const error = result.stderr.trim() || `systemctl exited with code ${result.code}`
		log.service.warn({ service: name, error }, "service restart failed")
		return { success: false, error }
	} catch (err) {
		const error = errorMessage(err)
		log.service.warn({ service: name, error }, "service restart failed")
		return { success: false, error }
	}
}
