/**
 * Errors raised while building a street graph.
 *
 * Searches never throw for unknown keys or unreachable goals; those are
 * ordinary results. These errors only cover input that would make search
 * results wrong.
 *
 * @module
 */

/** Thrown by `addEdge` for a negative or non-finite weight. */
export class InvalidWeightError extends Error {
	override readonly name = "InvalidWeightError"

	constructor(
		readonly from: string,
		readonly to: string,
		readonly weight: number,
	) {
		super(
			`Invalid weight ${weight} for edge ${from} -> ${to}: weights must be finite and non-negative`,
		)
	}
}

/** Thrown by `addEdge` for a missing endpoint when auto-creation is off. */
export class UnknownNodeError extends Error {
	override readonly name = "UnknownNodeError"

	constructor(readonly key: string) {
		super(`Unknown node ${key}`)
	}
}
