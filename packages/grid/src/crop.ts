import type { GeoBbox2D, PxBbox, TileGrid } from "@tilestitch/shared/types"
import SphericalMercatorGrid from "./spherical-mercator"

/**
 * Pixel rectangle `[left, top, right, bottom]` to crop from a grid's composite so it shows exactly `bbox`.
 */
export function bboxToCropPx(
	bbox: GeoBbox2D,
	grid: TileGrid,
	tileSize = 256,
): PxBbox {
	return new SphericalMercatorGrid({ size: tileSize, grid }).bboxToGridPx(
		bbox,
	)
}

export function pxBboxSize(px: PxBbox): { width: number; height: number } {
	return { width: px[2] - px[0], height: px[3] - px[1] }
}
