/**
 * Centralized logging with pino
 *
 * Pino carries the structured record of a run; ui.ts prints the
 * user-facing lines. Level comes from LOG_LEVEL (or DEBUG), so tests
 * can silence it before anything is imported.
 */

import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Pretty output for interactive use, raw JSON under CI or when piped
const isDev = Boolean(process.stderr.isTTY) && !process.env["CI"]

function createRootLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						destination: 2,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino(
				{
					level,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export const logger = createRootLogger()

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("placement")
 * log.debug({ path }, "installing firmware")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

export const log = {
	get catalog() {
		return createLogger("catalog")
	},
	get index() {
		return createLogger("index")
	},
	get placement() {
		return createLogger("placement")
	},
	get download() {
		return createLogger("download")
	},
	get mirror() {
		return createLogger("mirror")
	},
	get service() {
		return createLogger("service")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
