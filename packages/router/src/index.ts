/**
 * @streetnav/router - Shortest paths on weighted street networks.
 *
 * Builds a street graph from named nodes and weighted edges and finds
 * optimal routes between nodes with Dijkstra or A*. Routes can be turned into
 * turn-by-turn directions.
 *
 * Key features:
 * - **Graph construction**: Named nodes with planar coordinates, one-way or
 *   two-way streets, weight validation.
 * - **Interchangeable algorithms**: `dijkstra` and `astar` share one
 *   signature and return identical costs.
 * - **Reproducible ties**: Equal priorities are broken by key order.
 * - **Directions**: Readable step list with street names and weights.
 *
 * @example
 * ```ts
 * import { Navigator, StreetGraph } from "@streetnav/router"
 *
 * const graph = new StreetGraph()
 * graph.addNode("home", 0, 0, "Home")
 * graph.addNode("store", 1.5, 0, "Store")
 * graph.addNode("park", 3, 1, "Park")
 * graph.addEdge("home", "store", 1.5, "Main St")
 * graph.addEdge("store", "park", 2, "Oak Ave")
 *
 * const navigator = new Navigator(graph)
 * const { path, cost } = navigator.findPath("home", "park")
 * if (path) {
 *   console.log(cost, navigator.describeRoute(path))
 * }
 * ```
 *
 * @module @streetnav/router
 */

export * from "./algorithms"
export * from "./binary-heap"
export * from "./directions"
export * from "./errors"
export * from "./graph"
export * from "./navigator"
export * from "./types"
