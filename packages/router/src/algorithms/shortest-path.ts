import { assert } from "@streetnav/shared/assert"
import { BinaryHeap } from "../binary-heap"
import type {
	SearchableGraph,
	SearchAlgorithmFn,
	SearchOptions,
	SearchResult,
} from "../types"

/** Result for an unknown endpoint or an unreachable goal. */
export const NO_PATH: Readonly<SearchResult> = Object.freeze({
	path: null,
	cost: Number.POSITIVE_INFINITY,
})

const noPath = (): SearchResult => ({ path: null, cost: NO_PATH.cost })

/**
 * Label-setting shortest path search with a configurable heuristic.
 *
 * When the heuristic returns 0 for all nodes this is Dijkstra's algorithm.
 * With an admissible heuristic it is A* and still returns optimal costs.
 * Edge weights must be non-negative.
 *
 * All working state lives in this call frame, so concurrent searches over
 * one graph never interfere.
 */
function shortestPath(
	graph: SearchableGraph,
	start: string,
	goal: string,
	heuristic: (key: string) => number,
	options: SearchOptions,
): SearchResult {
	if (!graph.hasNode(start) || !graph.hasNode(goal)) return noPath()

	const gScore = new Map<string, number>() // Best known cost, missing = Infinity
	const previous = new Map<string, string>() // Predecessor on the best path
	const settled = new Set<string>()
	const heap = new BinaryHeap()

	gScore.set(start, 0)
	heap.push(start, heuristic(start))

	while (heap.size > 0) {
		if (options.shouldContinue && !options.shouldContinue()) return noPath()

		const current = heap.pop()
		if (current === undefined) break

		// Stale duplicate of an already settled node
		if (settled.has(current)) continue
		settled.add(current)
		options.onSettle?.(current)

		if (current === goal) break

		const currentG = gScore.get(current) ?? Number.POSITIVE_INFINITY

		for (const { key: neighbor, weight } of graph.neighbors(current)) {
			if (settled.has(neighbor)) continue

			const tentativeG = currentG + weight
			const existingG = gScore.get(neighbor) ?? Number.POSITIVE_INFINITY

			if (tentativeG < existingG) {
				gScore.set(neighbor, tentativeG)
				previous.set(neighbor, current)
				heap.push(neighbor, tentativeG + heuristic(neighbor))
			}
		}
	}

	const cost = gScore.get(goal)
	if (cost === undefined || cost === Number.POSITIVE_INFINITY) return noPath()

	return { path: reconstructPath(previous, start, goal, settled.size), cost }
}

/**
 * Walk the predecessor chain back from the goal and reverse it.
 *
 * A chain longer than the number of settled nodes means the predecessor map
 * contains a cycle.
 */
export function reconstructPath(
	previous: ReadonlyMap<string, string>,
	start: string,
	goal: string,
	limit: number,
): string[] {
	const path = [goal]
	let current = goal

	while (current !== start) {
		const prev = previous.get(current)
		assert(prev !== undefined, `Broken predecessor chain at ${current}`)
		path.push(prev)
		assert(path.length <= limit, `Predecessor cycle through ${prev}`)
		current = prev
	}

	return path.reverse()
}

/**
 * Dijkstra's algorithm - optimal shortest path without heuristic guidance.
 * Settles nodes in order of increasing cost from start.
 */
export const dijkstra: SearchAlgorithmFn = (
	graph,
	start,
	goal,
	options = {},
) => {
	return shortestPath(graph, start, goal, () => 0, options)
}

/**
 * A* algorithm - orders the frontier by cost so far plus the straight-line
 * distance to the goal.
 *
 * Optimal as long as no edge weighs less than the straight-line distance
 * between its endpoints. That holds for street lengths but is not checked.
 */
export const astar: SearchAlgorithmFn = (graph, start, goal, options = {}) => {
	return shortestPath(
		graph,
		start,
		goal,
		(key) => graph.straightLineDistance(key, goal),
		options,
	)
}
