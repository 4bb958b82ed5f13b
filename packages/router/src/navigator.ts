/**
 * High-level navigation API.
 *
 * Wraps a street graph and the search algorithms to find routes and describe
 * them as directions, statistics or per-street segments.
 *
 * @module
 */

import type { XY } from "@streetnav/shared/types"
import { astar, dijkstra, searchAlgorithms } from "./algorithms"
import { describeRoute } from "./directions"
import type { StreetGraph } from "./graph"
import type {
	NavigatorOptions,
	RoutePathInfo,
	RouteStatistics,
	SearchOptions,
	SearchResult,
	StreetEdge,
	StreetSegment,
} from "./types"

type NavigatorSearchOptions = SearchOptions & Partial<NavigatorOptions>

/**
 * Finds and describes routes through a street graph.
 *
 * @example
 * ```ts
 * const navigator = new Navigator(graph, { algorithm: "dijkstra" })
 * const { path, cost } = navigator.findPath("home", "park")
 * console.log(navigator.describeRoute(path).join("\n"))
 * ```
 */
export class Navigator {
	readonly graph: StreetGraph
	private readonly defaults: Required<NavigatorOptions>

	constructor(graph: StreetGraph, options: Partial<NavigatorOptions> = {}) {
		this.graph = graph
		this.defaults = {
			algorithm: options.algorithm ?? "astar",
		}
	}

	/**
	 * Find a route between two keys with the configured algorithm, or the one
	 * named in `options`.
	 */
	findPath(
		start: string,
		goal: string,
		options: NavigatorSearchOptions = {},
	): SearchResult {
		const { algorithm, ...searchOptions } = options
		const search = searchAlgorithms[algorithm ?? this.defaults.algorithm]
		return search(this.graph, start, goal, searchOptions)
	}

	findPathDijkstra(
		start: string,
		goal: string,
		options?: SearchOptions,
	): SearchResult {
		return dijkstra(this.graph, start, goal, options)
	}

	findPathAstar(
		start: string,
		goal: string,
		options?: SearchOptions,
	): SearchResult {
		return astar(this.graph, start, goal, options)
	}

	/** Turn-by-turn directions for a path. */
	describeRoute(path: readonly string[] | null | undefined): string[] {
		return describeRoute(this.graph, path)
	}

	/**
	 * Sum the weights of the edges a path traverses.
	 * Steps without a connecting edge are skipped.
	 */
	getRouteStatistics(path: readonly string[]): RouteStatistics {
		let cost = 0
		let edges = 0
		for (const edge of this.traversedEdges(path)) {
			cost += edge.weight
			edges++
		}
		return { cost, edges }
	}

	/**
	 * Build the per-street breakdown of a path.
	 * Consecutive edges with the same street name are merged into a single
	 * segment, and the key where each new street starts becomes a turn point.
	 */
	getRoutePathInfo(path: readonly string[]): RoutePathInfo {
		const segments: StreetSegment[] = []
		const turnPoints: string[] = []
		const turnCoordinates: XY[] = []
		let currentSegment: StreetSegment | null = null

		for (const edge of this.traversedEdges(path)) {
			if (currentSegment && currentSegment.name === edge.name) {
				currentSegment.nodeKeys.push(edge.to)
				currentSegment.cost += edge.weight
				continue
			}

			if (currentSegment) {
				segments.push(currentSegment)
				turnPoints.push(edge.from)
				const node = this.graph.getNode(edge.from)
				if (node) turnCoordinates.push([node.x, node.y])
			}
			currentSegment = {
				name: edge.name,
				nodeKeys: [edge.from, edge.to],
				cost: edge.weight,
			}
		}

		if (currentSegment) segments.push(currentSegment)

		return { segments, turnPoints, turnCoordinates }
	}

	private *traversedEdges(path: readonly string[]): Generator<StreetEdge> {
		for (let i = 1; i < path.length; i++) {
			const from = path[i - 1]
			const to = path[i]
			if (from === undefined || to === undefined) continue
			const edge = this.graph.getEdge(from, to)
			if (edge) yield edge
		}
	}
}
