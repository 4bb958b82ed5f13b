/** Planar coordinate pair, in the same units as the graph's edge weights. */
export type XY = [x: number, y: number]
