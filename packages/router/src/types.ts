/**
 * Type definitions for the routing module.
 * @module
 */

import type { ProgressCallback } from "@streetnav/shared/progress"
import type { XY } from "@streetnav/shared/types"

/** A location or intersection in the street network. */
export interface StreetNode {
	/** Unique key. Node identity is by key only. */
	readonly key: string
	/** Horizontal coordinate, used as heuristic input. */
	readonly x: number
	/** Vertical coordinate, used as heuristic input. */
	readonly y: number
	/** Display name. Defaults to the key. */
	readonly name: string
}

/** A directed, weighted street connection. */
export interface StreetEdge {
	/** Source node key. Always equals the key the edge is stored under. */
	readonly from: string
	/** Destination node key. */
	readonly to: string
	/** Non-negative cost of traversing the edge. */
	readonly weight: number
	/** Street name, may be empty. */
	readonly name: string
}

/** Outgoing neighbor of a node as seen by the searches. */
export interface Neighbor {
	key: string
	weight: number
}

/** Graph construction options. */
export interface StreetGraphOptions {
	/**
	 * Create missing endpoints as bare nodes (0,0, name = key) in `addEdge`.
	 * When false, `addEdge` throws `UnknownNodeError` instead. Default: true.
	 */
	autoCreateNodes: boolean
	/**
	 * Receives a message whenever a node is auto-created.
	 * Default: `logProgress`.
	 */
	onProgress: ProgressCallback
}

/**
 * Read-only view of a graph that the searches need.
 */
export interface SearchableGraph {
	hasNode(key: string): boolean
	neighbors(key: string): Neighbor[]
	straightLineDistance(keyA: string, keyB: string): number
}

/**
 * Result of a search. `path` runs from start to goal inclusive, or is null
 * with an infinite cost when the goal cannot be reached.
 */
export interface SearchResult {
	path: string[] | null
	cost: number
}

/** Optional hooks for a single search call. */
export interface SearchOptions {
	/**
	 * Checked before each heap pop. Returning false abandons the search and
	 * yields the no-path result.
	 */
	shouldContinue?: () => boolean
	/** Called with each key as it is settled, in settle order. */
	onSettle?: (key: string) => void
}

/** Available search algorithms. */
export type SearchAlgorithm = "dijkstra" | "astar"

/** Function signature shared by the search algorithms. */
export type SearchAlgorithmFn = (
	graph: SearchableGraph,
	start: string,
	goal: string,
	options?: SearchOptions,
) => SearchResult

/** Navigator configuration. */
export interface NavigatorOptions {
	/** Search algorithm. Default: "astar". */
	algorithm: SearchAlgorithm
}

/** Consecutive edges on the same street merged into one leg. */
export interface StreetSegment {
	/** Street name (empty for unnamed edges). */
	name: string
	/** Node keys covered by this segment, endpoints included. */
	nodeKeys: string[]
	/** Summed weight of the merged edges. */
	cost: number
}

/** Route statistics. */
export interface RouteStatistics {
	/** Sum of traversed edge weights. */
	cost: number
	/** Number of traversed edges. */
	edges: number
}

/** Route path info (segments and turn points). */
export interface RoutePathInfo {
	/** Per-street breakdown (consecutive same-name edges merged). */
	segments: StreetSegment[]
	/** Keys where the street name changes. */
	turnPoints: string[]
	/** Coordinates of the turn points, in the same order. */
	turnCoordinates: XY[]
}
