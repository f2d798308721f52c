/**
 * @tilestitch/fetch - Raster tile downloads.
 *
 * @example
 * ```ts
 * import { TileFetcher } from "@tilestitch/fetch"
 *
 * const fetcher = new TileFetcher({ userAgent: "my-app/1.0 (me@example.com)" })
 * const result = await fetcher.fetchTile([1205, 1539, 12])
 * if (!result.ok) console.error(result.error.message)
 * ```
 *
 * @module @tilestitch/fetch
 */

export * from "./settings"
export * from "./template"
export * from "./tile-fetcher"
