/**
 * Structured logger
 *
 * Writes to stderr: stdout is reserved for the MCP protocol when the server
 * runs over stdio. Every component receives a Logger instead of calling
 * console directly, so tests can pass silentLogger.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function write(level: LogLevel, message: string, data?: LogData): void {
	const tag = `[${level.toUpperCase()}]`
	if (data && Object.keys(data).length > 0) {
		console.error(tag, message, JSON.stringify(data))
	} else {
		console.error(tag, message)
	}
}

export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (at: LogLevel) => (message: string, data?: LogData) => {
		if (LEVEL_ORDER[at] >= threshold) write(at, message, data)
	}
	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
