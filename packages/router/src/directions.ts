import type { StreetGraph } from "./graph"

const UNKNOWN = "unknown"

/**
 * Format a weight with one decimal, rounding exact ties to the even digit.
 *
 * `toFixed` rounds a tie up. The only weights that sit exactly halfway
 * between two tenths are odd multiples of 0.25, so those are rounded here.
 */
export function formatWeight(weight: number): string {
	const quarters = weight * 4
	if (!Number.isInteger(quarters) || quarters % 2 === 0) {
		return weight.toFixed(1)
	}
	let tenths = Math.floor(weight * 10)
	if (tenths % 2 !== 0) tenths++
	return (tenths / 10).toFixed(1)
}

/**
 * Turn a path into human-readable directions, one line per node plus one
 * per traversed edge.
 *
 * @example
 * ```ts
 * describeRoute(graph, ["home", "store"])
 * // ["Start at Home", "Go to Store via Main St (1.5 units)", "Arrive at Store"]
 * ```
 */
export function describeRoute(
	graph: StreetGraph,
	path: readonly string[] | null | undefined,
): string[] {
	const first = path?.[0]
	const last = path?.[path.length - 1]
	if (!path || first === undefined || last === undefined) {
		return ["No route found"]
	}

	const nameOf = (key: string) => graph.getNode(key)?.name ?? UNKNOWN

	if (path.length === 1) return [`You are already at ${nameOf(first)}`]

	const directions = [`Start at ${nameOf(first)}`]

	for (let i = 1; i < path.length; i++) {
		const from = path[i - 1]
		const to = path[i]
		if (from === undefined || to === undefined) continue

		const edge = graph.getEdge(from, to)
		if (edge) {
			const street = edge.name || "the street"
			directions.push(
				`Go to ${nameOf(to)} via ${street} (${formatWeight(edge.weight)} units)`,
			)
		} else {
			directions.push(`Go to ${nameOf(to)}`)
		}
	}

	directions.push(`Arrive at ${nameOf(last)}`)
	return directions
}
