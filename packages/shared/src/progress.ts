/**
 * Progress message helpers.
 *
 * Operations with side effects worth reporting accept an `onProgress`
 * callback and send plain messages through it. `logProgress` is the default
 * sink: it stamps each message and prints it to the console.
 *
 * @module
 */

/** Progress payload containing a message and timestamp. */
export type Progress = {
	msg: string
	timestamp: number
}

/** Callback receiving progress messages. */
export type ProgressCallback = (message: string) => void

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
 * Format a progress payload as a single log line.
 */
export function formatProgress(p: Progress): string {
	return `[${new Date(p.timestamp).toISOString()}] ${p.msg}`
}

/**
 * Log a progress message to the console.
 * @param msg - The message to log.
 */
export function logProgress(msg: string) {
	console.log(formatProgress(progress(msg)))
}
