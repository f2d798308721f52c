/**
 * tilestitch - Stitch OpenStreetMap raster tiles into one image.
 *
 * Computes the tiles covering a bounding box, downloads them one at a time,
 * pastes them into a composite and crops it to the exact box.
 *
 * @example
 * ```ts
 * import { stitchTiles } from "tilestitch"
 *
 * const result = await stitchTiles({
 *   bbox: [8.3795, 47.381, 10.692, 48.926],
 *   zoom: 10,
 *   output: "map.png",
 *   fetcherOptions: { userAgent: "my-app/1.0 (me@example.com)" },
 * })
 * console.log(`${result.width}x${result.height}, ${result.failed} tiles missing`)
 * ```
 *
 * @module tilestitch
 */

export * from "./args"
export * from "./cli"
export * from "./notice"
export * from "./reporter"
export * from "./settings"
export * from "./stitch"
