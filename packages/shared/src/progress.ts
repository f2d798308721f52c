/**
 * Progress helpers for long-running operations.
 *
 * Progress is observational only: producers yield or emit `Progress` payloads and
 * consumers decide how to display them.
 *
 * @module
 */

/**
 * Progress payload containing a message and timestamp.
 */
export type Progress = {
	msg: string
	timestamp: number
}

/**
 * Counts attached to progress while working through a known number of items.
 */
export type CountProgress = Progress & {
	completed: number
	total: number
	percent: number
	itemsPerSecond: number
}

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Create a CountProgress payload. Rate is measured from `startTime` (ms since epoch).
 */
export function countProgress(
	msg: string,
	completed: number,
	total: number,
	startTime: number,
): CountProgress {
	const timestamp = Date.now()
	const elapsedSeconds = (timestamp - startTime) / 1_000
	return {
		msg,
		timestamp,
		completed,
		total,
		percent: total > 0 ? (completed / total) * 100 : 100,
		itemsPerSecond: elapsedSeconds > 0 ? completed / elapsedSeconds : 0,
	}
}

/** Type guard: check if a progress payload carries counts. */
export function isCountProgress(p: Progress): p is CountProgress {
	return "completed" in p && "total" in p
}

/**
 * Log a progress message to the console.
 */
export function logProgress(p: Progress) {
	console.log(p.msg)
}
