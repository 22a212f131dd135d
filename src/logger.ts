/**
 * Console logger handed to every component.
 *
 * Writes to stderr so stdout stays reserved for command output.
 */

import type { Logger } from "./config.js"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function createLogger(
	level: LogLevel = "info",
	write: (line: string) => void = (line) => console.error(line),
): Logger {
	const threshold = LEVEL_ORDER[level]

	const emit = (msgLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
		if (LEVEL_ORDER[msgLevel] < threshold) return
		const suffix = data ? ` ${JSON.stringify(data)}` : ""
		write(`[${msgLevel.toUpperCase()}] ${message}${suffix}`)
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	}
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
