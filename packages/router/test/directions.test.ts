import { describe, expect, it } from "vitest"
import { describeRoute, formatWeight } from "../src/directions"
import { StreetGraph } from "../src/graph"

function createGraph(): StreetGraph {
	const graph = new StreetGraph()
	graph.addNode("Home", 0, 0, "Home")
	graph.addNode("Store", 1, 1, "Corner Store")
	graph.addNode("Park", 2, 0, "City Park")
	graph.addEdge("Home", "Store", 1.5, "Main St")
	graph.addEdge("Store", "Park", 2.04)
	return graph
}

describe("describeRoute", () => {
	it("should report a missing route", () => {
		const graph = createGraph()
		expect(describeRoute(graph, null)).toEqual(["No route found"])
		expect(describeRoute(graph, undefined)).toEqual(["No route found"])
		expect(describeRoute(graph, [])).toEqual(["No route found"])
	})

	it("should report arrival for a single-node path", () => {
		expect(describeRoute(createGraph(), ["Store"])).toEqual([
			"You are already at Corner Store",
		])
	})

	it("should list one line per node and edge", () => {
		expect(describeRoute(createGraph(), ["Home", "Store", "Park"])).toEqual([
			"Start at Home",
			"Go to Corner Store via Main St (1.5 units)",
			"Go to City Park via the street (2.0 units)",
			"Arrive at City Park",
		])
	})

	it("should omit the street when no edge links two steps", () => {
		expect(describeRoute(createGraph(), ["Home", "Park"])).toEqual([
			"Start at Home",
			"Go to City Park",
			"Arrive at City Park",
		])
	})

	it("should name unknown keys as unknown", () => {
		expect(describeRoute(createGraph(), ["Home", "Mall"])).toEqual([
			"Start at Home",
			"Go to unknown",
			"Arrive at unknown",
		])
		expect(describeRoute(createGraph(), ["Mall"])).toEqual([
			"You are already at unknown",
		])
	})

	it("should round weights halfway between tenths to the even digit", () => {
		const graph = new StreetGraph()
		graph.addNode("A", 0, 0)
		graph.addNode("B", 1, 0)
		graph.addEdge("A", "B", 1.25, "Elm")

		expect(describeRoute(graph, ["A", "B"])[1]).toBe(
			"Go to B via Elm (1.2 units)",
		)
	})
})

describe("formatWeight", () => {
	it("should round exact ties to the even digit", () => {
		expect(formatWeight(0.25)).toBe("0.2")
		expect(formatWeight(0.75)).toBe("0.8")
		expect(formatWeight(1.25)).toBe("1.2")
		expect(formatWeight(2.75)).toBe("2.8")
	})

	it("should round other weights to the nearest tenth", () => {
		expect(formatWeight(1.5)).toBe("1.5")
		expect(formatWeight(2)).toBe("2.0")
		expect(formatWeight(2.04)).toBe("2.0")
		expect(formatWeight(3.96)).toBe("4.0")
	})
})
