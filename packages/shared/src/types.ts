export type LonLat = [lon: number, lat: number]
export type XY = [x: number, y: number]
export type Tile = [x: number, y: number, z: number]

/**
 * A bounding box in the format [minLon, minLat, maxLon, maxLat].
 */
export type GeoBbox2D = [
	minLon: number,
	minLat: number,
	maxLon: number,
	maxLat: number,
]

/**
 * A pixel rectangle in the format [left, top, right, bottom]. Right and bottom are exclusive.
 */
export type PxBbox = [left: number, top: number, right: number, bottom: number]

/**
 * The contiguous block of tiles covering a bounding box at one zoom level.
 */
export interface TileGrid {
	zoom: number
	minX: number
	minY: number
	maxX: number
	maxY: number
	cols: number
	rows: number
	// Row-major, west to east then north to south
	tiles: Tile[]
}

/**
 * Encoded tile bytes as returned by the tile server.
 */
export interface TileImage {
	readonly tile: Tile
	readonly data: Uint8Array
}

export type LogLevel = "debug" | "info" | "warn" | "error"

export type Logger = (message: string, level?: LogLevel) => void
