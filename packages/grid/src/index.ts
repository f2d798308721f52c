/**
 * @tilestitch/grid - Tile grids for geographic bounding boxes.
 *
 * Maps a bounding box and zoom to the block of slippy-map tiles covering it, and
 * maps the same box back to the pixel rectangle inside the stitched composite.
 * Both directions use the Web Mercator projection.
 *
 * @example
 * ```ts
 * import { bboxToCropPx, bboxToTileGrid } from "@tilestitch/grid"
 *
 * const bbox: GeoBbox2D = [-74.02, 40.7, -73.97, 40.75]
 * const grid = bboxToTileGrid(bbox, 12)
 * const [left, top, right, bottom] = bboxToCropPx(bbox, grid)
 * ```
 *
 * @module @tilestitch/grid
 */

export * from "./crop"
export { default as SphericalMercatorGrid } from "./spherical-mercator"
export * from "./tile-grid"
