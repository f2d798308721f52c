import { pointToTileFraction } from "@mapbox/tilebelt"
import {
	GridTooLargeError,
	InvalidBboxError,
	UnsupportedZoomError,
} from "@tilestitch/shared/errors"
import {
	isValidTile,
	MAX_MERCATOR_LAT,
	tileToBbox,
} from "@tilestitch/shared/tile"
import type { GeoBbox2D, Tile, TileGrid, XY } from "@tilestitch/shared/types"

export const MIN_ZOOM = 0
export const MAX_ZOOM = 19
export const DEFAULT_MAX_TILES = 2_500

// Pulls the south-east corner inside the box so an edge on a tile boundary stays out of the grid.
const LL_EPSILON = 1e-11

export interface ZoomRange {
	minZoom: number
	maxZoom: number
}

export interface GridLimits extends ZoomRange {
	maxTiles: number
}

export function assertValidBbox(bbox: GeoBbox2D) {
	const [minLon, minLat, maxLon, maxLat] = bbox
	if (!bbox.every(Number.isFinite)) {
		throw new InvalidBboxError(bbox, "coordinates must be finite numbers")
	}
	if (minLon >= maxLon) {
		throw new InvalidBboxError(bbox, "minLon must be less than maxLon")
	}
	if (minLat >= maxLat) {
		throw new InvalidBboxError(bbox, "minLat must be less than maxLat")
	}
	if (minLon < -180 || maxLon > 180) {
		throw new InvalidBboxError(bbox, "longitude must be within [-180, 180]")
	}
	if (minLat < -MAX_MERCATOR_LAT || maxLat > MAX_MERCATOR_LAT) {
		throw new InvalidBboxError(
			bbox,
			`latitude must be within [-${MAX_MERCATOR_LAT}, ${MAX_MERCATOR_LAT}]`,
		)
	}
}

export function assertValidZoom(
	zoom: number,
	{ minZoom, maxZoom }: ZoomRange = { minZoom: MIN_ZOOM, maxZoom: MAX_ZOOM },
) {
	if (!Number.isInteger(zoom) || zoom < minZoom || zoom > maxZoom) {
		throw new UnsupportedZoomError(zoom, minZoom, maxZoom)
	}
}

/**
 * Find the tiles covering a bounding box at the given zoom.
 * Throws before doing any work if the box or zoom is invalid, or if the grid holds more than `maxTiles` tiles.
 */
export function bboxToTileGrid(
	bbox: GeoBbox2D,
	zoom: number,
	limits: Partial<GridLimits> = {},
): TileGrid {
	const maxTiles = limits.maxTiles ?? DEFAULT_MAX_TILES
	assertValidBbox(bbox)
	assertValidZoom(zoom, {
		minZoom: limits.minZoom ?? MIN_ZOOM,
		maxZoom: limits.maxZoom ?? MAX_ZOOM,
	})

	const [minLon, minLat, maxLon, maxLat] = bbox
	const last = 2 ** zoom - 1
	const clampIndex = (v: number) => Math.max(0, Math.min(last, Math.floor(v)))

	const [nwX = 0, nwY = 0] = pointToTileFraction(minLon, maxLat, zoom)
	const [seX = 0, seY = 0] = pointToTileFraction(
		maxLon - LL_EPSILON,
		minLat + LL_EPSILON,
		zoom,
	)
	const minX = clampIndex(nwX)
	const minY = clampIndex(nwY)
	const maxX = clampIndex(seX)
	const maxY = clampIndex(seY)
	const cols = maxX - minX + 1
	const rows = maxY - minY + 1

	// Checked before building the list, which alone can exhaust memory at high zooms
	if (cols * rows > maxTiles) {
		throw new GridTooLargeError(
			`${cols}x${rows} tiles at zoom ${zoom} exceeds the limit of ${maxTiles}`,
		)
	}

	const tiles: Tile[] = []
	for (let y = minY; y <= maxY; y++) {
		for (let x = minX; x <= maxX; x++) {
			tiles.push([x, y, zoom])
		}
	}

	return {
		zoom,
		minX,
		minY,
		maxX,
		maxY,
		cols,
		rows,
		tiles,
	}
}

/**
 * Top-left pixel of a tile within the composite for its grid.
 */
export function gridTilePxOffset(
	grid: TileGrid,
	tile: Tile,
	tileSize: number,
): XY {
	return [(tile[0] - grid.minX) * tileSize, (tile[1] - grid.minY) * tileSize]
}

/**
 * Composite dimensions in pixels for a grid.
 */
export function gridPxSize(grid: TileGrid, tileSize: number): XY {
	return [grid.cols * tileSize, grid.rows * tileSize]
}

/**
 * Geographic extent of the whole grid, which is always at least as large as the requested box.
 */
export function gridBbox(grid: TileGrid): GeoBbox2D {
	const [west, , , north] = tileToBbox([grid.minX, grid.minY, grid.zoom])
	const [, south, east] = tileToBbox([grid.maxX, grid.maxY, grid.zoom])
	return [west, south, east, north]
}

export function gridContains(grid: TileGrid, tile: Tile): boolean {
	return (
		isValidTile(tile) &&
		tile[2] === grid.zoom &&
		tile[0] >= grid.minX &&
		tile[0] <= grid.maxX &&
		tile[1] >= grid.minY &&
		tile[1] <= grid.maxY
	)
}
