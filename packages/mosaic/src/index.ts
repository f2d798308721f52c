/**
 * @tilestitch/mosaic - Stitch, crop and save raster tiles.
 *
 * @module @tilestitch/mosaic
 */

export * from "./composite"
export * from "./crop"
export * from "./write"
