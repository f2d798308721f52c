import type { GeoBbox2D, Tile, XY } from "./types"

const RADIANS_TO_DEGREES = 180 / Math.PI

/** Northern and southern limit of the Web Mercator projection. */
export const MAX_MERCATOR_LAT = 85.0511287798066

export function tile2lon(x: number, z: number): number {
	return (x / 2 ** z) * 360 - 180
}

export function tile2lat(y: number, z: number): number {
	const n = Math.PI - (2 * Math.PI * y) / 2 ** z
	return RADIANS_TO_DEGREES * Math.atan(0.5 * (Math.exp(n) - Math.exp(-n)))
}

/**
 * Check that a tile has integer coordinates inside the `2^z` grid.
 */
export function isValidTile(tile: Tile): boolean {
	const [x, y, z] = tile
	const n = 2 ** z
	return (
		Number.isInteger(x) &&
		Number.isInteger(y) &&
		Number.isInteger(z) &&
		z >= 0 &&
		x >= 0 &&
		x < n &&
		y >= 0 &&
		y < n
	)
}

/**
 * Get the geographic bounding box of a tile.
 * Returns [west, south, east, north].
 */
export function tileToBbox(tile: Tile): GeoBbox2D {
	const [tx, ty, tz] = tile
	const n = tile2lat(ty, tz)
	const s = tile2lat(ty + 1, tz)
	const e = tile2lon(tx + 1, tz)
	const w = tile2lon(tx, tz)
	return [w, s, e, n]
}

/**
 * Clamp a pixel coordinate to a pixel rectangle and round to the nearest integer.
 */
export function clampAndRoundPx(
	px: XY,
	sizeOrBbox: number | [number, number, number, number],
): XY {
	const [minX, minY, maxX, maxY] =
		typeof sizeOrBbox === "number"
			? [0, 0, sizeOrBbox, sizeOrBbox]
			: sizeOrBbox
	return [
		Math.max(minX, Math.min(maxX, Math.round(px[0]))),
		Math.max(minY, Math.min(maxY, Math.round(px[1]))),
	]
}

export function tileKey(tile: Tile): string {
	return `${tile[2]}/${tile[0]}/${tile[1]}`
}
