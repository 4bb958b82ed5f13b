/**
 * Weighted street graph.
 *
 * Holds nodes with planar coordinates and display names, and the outgoing
 * edges of each node in insertion order. Streets are bidirectional unless
 * added with `bidirectional = false`, in which case only the forward edge
 * is stored.
 *
 * @module
 */

import { euclideanDistance } from "@streetnav/shared/euclidean-distance"
import { logProgress } from "@streetnav/shared/progress"
import { InvalidWeightError, UnknownNodeError } from "./errors"
import type {
	Neighbor,
	SearchableGraph,
	StreetEdge,
	StreetGraphOptions,
	StreetNode,
} from "./types"

/**
 * Street network built from named nodes and weighted edges.
 *
 * The graph is meant to be built once and then searched. Searches only read
 * from it, so several searches may share one graph as long as nothing adds
 * nodes or edges meanwhile.
 *
 * @example
 * ```ts
 * const graph = new StreetGraph()
 * graph.addNode("home", 0, 0, "Home")
 * graph.addNode("store", 1, 0, "Store")
 * graph.addEdge("home", "store", 1.5, "Main St")
 * graph.neighbors("home") // [{ key: "store", weight: 1.5 }]
 * ```
 */
export class StreetGraph implements SearchableGraph {
	private readonly nodes = new Map<string, StreetNode>()
	private readonly edges = new Map<string, StreetEdge[]>()
	private edgeTotal = 0

	readonly options: StreetGraphOptions

	constructor(options: Partial<StreetGraphOptions> = {}) {
		this.options = {
			autoCreateNodes: options.autoCreateNodes ?? true,
			onProgress: options.onProgress ?? logProgress,
		}
	}

	/**
	 * Add a node. If the key already exists the existing node is returned
	 * unchanged; the first insertion's coordinates and name win.
	 *
	 * Coordinates are expected to be finite. They only feed the A* heuristic,
	 * and `straightLineDistance` treats a node with a non-finite coordinate
	 * like an unknown one.
	 */
	addNode(key: string, x = 0, y = 0, name = ""): StreetNode {
		const existing = this.nodes.get(key)
		if (existing) return existing

		const node: StreetNode = Object.freeze({ key, x, y, name: name || key })
		this.nodes.set(key, node)
		this.edges.set(key, [])
		return node
	}

	/**
	 * Add a street from `from` to `to`, and the reverse street too when
	 * `bidirectional` is true.
	 *
	 * @throws InvalidWeightError if the weight is negative, NaN or infinite.
	 * @throws UnknownNodeError if an endpoint is missing and
	 * `autoCreateNodes` is off.
	 */
	addEdge(
		from: string,
		to: string,
		weight: number,
		name = "",
		bidirectional = true,
	): void {
		if (!Number.isFinite(weight) || weight < 0) {
			throw new InvalidWeightError(from, to, weight)
		}

		for (const key of [from, to]) {
			if (this.nodes.has(key)) continue
			if (!this.options.autoCreateNodes) throw new UnknownNodeError(key)
			this.addNode(key)
			this.options.onProgress(`Created node ${key} for edge ${from} -> ${to}`)
		}

		this.appendEdge({ from, to, weight, name })
		if (bidirectional) {
			this.appendEdge({ from: to, to: from, weight, name })
		}
	}

	private appendEdge(edge: StreetEdge) {
		let outgoing = this.edges.get(edge.from)
		if (!outgoing) {
			outgoing = []
			this.edges.set(edge.from, outgoing)
		}
		outgoing.push(Object.freeze(edge))
		this.edgeTotal++
	}

	/**
	 * Outgoing neighbors of a node in insertion order. Unknown keys have no
	 * neighbors.
	 */
	neighbors(key: string): Neighbor[] {
		return this.getEdges(key).map((edge) => ({
			key: edge.to,
			weight: edge.weight,
		}))
	}

	/**
	 * Straight-line distance between two nodes' coordinates, or 0 when either
	 * node is unknown or the distance is not finite.
	 */
	straightLineDistance(keyA: string, keyB: string): number {
		const a = this.nodes.get(keyA)
		const b = this.nodes.get(keyB)
		if (!a || !b) return 0
		const distance = euclideanDistance([a.x, a.y], [b.x, b.y])
		return Number.isFinite(distance) ? distance : 0
	}

	hasNode(key: string): boolean {
		return this.nodes.has(key)
	}

	getNode(key: string): StreetNode | undefined {
		return this.nodes.get(key)
	}

	/**
	 * Outgoing edges of a node in insertion order.
	 */
	getEdges(key: string): readonly StreetEdge[] {
		return this.edges.get(key) ?? []
	}

	/**
	 * First edge from `from` to `to` in insertion order.
	 */
	getEdge(from: string, to: string): StreetEdge | undefined {
		return this.getEdges(from).find((edge) => edge.to === to)
	}

	/**
	 * Get the number of nodes in the graph.
	 */
	get nodeCount(): number {
		return this.nodes.size
	}

	/**
	 * Get the number of directed edges in the graph.
	 */
	get edgeCount(): number {
		return this.edgeTotal
	}

	toString(): string {
		return `StreetGraph(nodes=${this.nodeCount}, edges=${this.edgeCount})`
	}
}
