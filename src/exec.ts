/**
 * Thin promise wrapper around child processes (id, getent, systemctl)
 */

import { spawn } from "node:child_process"

export interface CommandResult {
	code: number | null
	stdout: string
	stderr: string
}

/**
 * Run a command to completion. Resolves with the exit code instead of
 * rejecting on failure; rejects only when the command cannot be started.
 */
export async function runCommand(
	command: string,
	args: string[],
): Promise<CommandResult> {
	return new Promise((resolve, reject) => {
		const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] })
		let stdout = ""
		let stderr = ""

		proc.stdout.on("data", (chunk: Buffer) => {
			stdout += chunk.toString("utf8")
		})
		proc.stderr.on("data", (chunk: Buffer) => {
			stderr += chunk.toString("utf8")
		})

		proc.on("close", code => {
			resolve({ code, stdout, stderr })
		})

		proc.on("error", err => {
			reject(err)
		})
	})
}
