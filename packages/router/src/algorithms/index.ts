/**
 * Search algorithm implementations.
 *
 * - `dijkstra`: Optimal shortest path, explores all directions equally.
 * - `astar`: Optimal with straight-line heuristic guidance, faster for
 *   point-to-point queries.
 *
 * Both take the same arguments and return the same result shape, so they can
 * be swapped at the call site.
 *
 * @module
 */

import type { SearchAlgorithm, SearchAlgorithmFn } from "../types"
import { astar, dijkstra, NO_PATH, reconstructPath } from "./shortest-path"

export { astar, dijkstra, NO_PATH, reconstructPath }
export type { SearchAlgorithmFn }

export const searchAlgorithms: Record<SearchAlgorithm, SearchAlgorithmFn> = {
	dijkstra,
	astar,
}
