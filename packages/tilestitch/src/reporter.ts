import { type Progress, isCountProgress } from "@tilestitch/shared/progress"
import type { Logger, LogLevel } from "@tilestitch/shared/types"

export interface OutputStream {
	isTTY?: boolean
	write(chunk: string): unknown
}

export interface TerminalReporter {
	progress: (p: Progress) => void
	log: Logger
	// Finish any progress line still being rewritten
	done: () => void
}

/**
 * Print progress and log messages for the command line.
 *
 * On a TTY, counted progress rewrites one line in place; any other message first ends that line.
 */
export function createTerminalReporter(
	stdout: OutputStream,
	stderr: OutputStream,
	{ verbose = false } = {},
): TerminalReporter {
	let inline = false
	const endLine = () => {
		if (inline) {
			stdout.write("\n")
			inline = false
		}
	}

	return {
		progress: (p) => {
			if (isCountProgress(p) && stdout.isTTY) {
				stdout.write(`\r${p.msg}`)
				inline = true
				return
			}
			endLine()
			stdout.write(`${p.msg}\n`)
		},
		log: (message: string, level: LogLevel = "info") => {
			if (level === "debug" && !verbose) return
			endLine()
			if (level === "warn" || level === "error") stderr.write(`${message}\n`)
			else stdout.write(`${message}\n`)
		},
		done: endLine,
	}
}
