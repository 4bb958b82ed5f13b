import type { XY } from "./types"

/**
 * Calculate the straight-line distance between two planar points.
 * @param p1 - The first point
 * @param p2 - The second point
 * @returns The distance in coordinate units
 */
export function euclideanDistance(p1: XY, p2: XY): number {
	const dx = p2[0] - p1[0]
	const dy = p2[1] - p1[1]
	return Math.sqrt(dx * dx + dy * dy)
}
