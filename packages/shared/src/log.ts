import type { Logger, LogLevel } from "./types"

/**
 * Logger writing errors and warnings to stderr and everything else to stdout. Debug messages only appear when verbose.
 */
export function createConsoleLogger({ verbose = false } = {}): Logger {
	return (message: string, level: LogLevel = "info") => {
		if (level === "debug" && !verbose) return
		if (level === "error" || level === "warn") console.error(message)
		else console.log(message)
	}
}
