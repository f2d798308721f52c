import { SphericalMercator } from "@mapbox/sphericalmercator"
import { InvalidBboxError } from "@tilestitch/shared/errors"
import { clampAndRoundPx } from "@tilestitch/shared/tile"
import type {
	GeoBbox2D,
	LonLat,
	PxBbox,
	TileGrid,
	XY,
} from "@tilestitch/shared/types"
import { gridPxSize } from "./tile-grid"

/**
 * Extends the SphericalMercator class to project lon/lat into the pixel frame of a stitched tile grid.
 */
export default class SphericalMercatorGrid extends SphericalMercator {
	tileSize: number
	grid: TileGrid

	constructor(
		options: ConstructorParameters<typeof SphericalMercator>[0] & {
			grid: TileGrid
		},
	) {
		super(options)
		this.grid = options.grid
		this.tileSize = options.size ?? 256
	}

	/**
	 * Pixel position of a lon/lat relative to the top-left corner of the grid. Rounded, not clamped.
	 */
	llToGridPx(ll: LonLat): XY {
		const { minX, minY, zoom } = this.grid
		const [x = 0, y = 0] = this.px(ll, zoom)
		return [x - minX * this.tileSize, y - minY * this.tileSize]
	}

	/**
	 * Pixel rectangle of a bounding box within the composite, clamped to the composite bounds.
	 */
	bboxToGridPx(bbox: GeoBbox2D): PxBbox {
		const [width, height] = gridPxSize(this.grid, this.tileSize)
		const canvas: PxBbox = [0, 0, width, height]
		const [left, top] = clampAndRoundPx(
			this.llToGridPx([bbox[0], bbox[3]]),
			canvas,
		)
		const [right, bottom] = clampAndRoundPx(
			this.llToGridPx([bbox[2], bbox[1]]),
			canvas,
		)
		if (right <= left || bottom <= top) {
			throw new InvalidBboxError(
				bbox,
				`covers no pixels of the ${width}x${height} composite at zoom ${this.grid.zoom}`,
			)
		}
		return [left, top, right, bottom]
	}
}
