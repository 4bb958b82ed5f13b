import { bench, describe } from "vitest"
import { astar, dijkstra } from "../src/algorithms"
import { StreetGraph } from "../src/graph"

/**
 * Search benchmarks on synthetic street grids.
 *
 * Run with: npm run bench
 */

/**
 * Creates a square grid of `size` x `size` intersections, `spacing` apart,
 * joined by two-way streets whose weight equals their length.
 */
function createSyntheticGrid(size: number, spacing: number): StreetGraph {
	const graph = new StreetGraph()
	const key = (row: number, col: number) => `${row}:${col}`

	for (let row = 0; row < size; row++) {
		for (let col = 0; col < size; col++) {
			graph.addNode(key(row, col), col * spacing, row * spacing)
		}
	}

	for (let row = 0; row < size; row++) {
		for (let col = 0; col < size; col++) {
			if (col + 1 < size) {
				graph.addEdge(key(row, col), key(row, col + 1), spacing, `Row ${row}`)
			}
			if (row + 1 < size) {
				graph.addEdge(key(row, col), key(row + 1, col), spacing, `Col ${col}`)
			}
		}
	}

	return graph
}

for (const size of [10, 50, 100]) {
	const graph = createSyntheticGrid(size, 100)
	const start = "0:0"
	const goal = `${size - 1}:${size - 1}`
	const middle = `${size >> 1}:${size >> 1}`

	describe(`${size}x${size} grid, corner to corner`, () => {
		bench("dijkstra", () => {
			dijkstra(graph, start, goal)
		})
		bench("astar", () => {
			astar(graph, start, goal)
		})
	})

	describe(`${size}x${size} grid, corner to middle`, () => {
		bench("dijkstra", () => {
			dijkstra(graph, start, middle)
		})
		bench("astar", () => {
			astar(graph, start, middle)
		})
	})
}
