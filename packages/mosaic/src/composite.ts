import { gridContains, gridPxSize, gridTilePxOffset } from "@tilestitch/grid"
import {
	GridTooLargeError,
	InvalidBackgroundError,
	TileDecodeError,
} from "@tilestitch/shared/errors"
import { tileKey } from "@tilestitch/shared/tile"
import type { TileGrid, TileImage } from "@tilestitch/shared/types"
import sharp from "sharp"

export const DEFAULT_TILE_SIZE = 256
export const DEFAULT_BACKGROUND = "#000000"
// Largest edge a JPEG can hold; PNG output is held to the same bound
export const MAX_COMPOSITE_EDGE = 65_535

/** CSS colour string or `{ r, g, b, alpha }` object. */
export type Background = sharp.Color

/**
 * Raw pixels of the stitched tile grid, before cropping.
 */
export interface Composite {
	grid: TileGrid
	tileSize: number
	width: number
	height: number
	channels: sharp.Channels
	data: Buffer
}

export interface CompositeOptions {
	tileSize: number
	// Fill for the whole canvas, visible wherever a tile is missing
	background: Background
}

function toBuffer(data: Uint8Array) {
	return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Throw if the composite for `grid` would be wider or taller than `MAX_COMPOSITE_EDGE`.
 */
export function assertCompositeSize(grid: TileGrid, tileSize = DEFAULT_TILE_SIZE) {
	const [width, height] = gridPxSize(grid, tileSize)
	if (width > MAX_COMPOSITE_EDGE || height > MAX_COMPOSITE_EDGE) {
		throw new GridTooLargeError(
			`composite would be ${width}x${height} pixels, each side must be at most ${MAX_COMPOSITE_EDGE}`,
		)
	}
}

/**
 * Throw `InvalidBackgroundError` unless sharp accepts `background` as a fill colour.
 */
export async function assertValidBackground(background: Background) {
	try {
		await sharp({
			create: { width: 1, height: 1, channels: 3, background },
		})
			.raw()
			.toBuffer()
	} catch (error) {
		const label =
			typeof background === "string" ? background : JSON.stringify(background)
		throw new InvalidBackgroundError(label, error)
	}
}

/**
 * Check that tile bytes decode to a square image of the expected size.
 */
export async function decodeTileImage(
	image: TileImage,
	tileSize = DEFAULT_TILE_SIZE,
): Promise<sharp.Metadata> {
	let metadata: sharp.Metadata
	try {
		metadata = await sharp(toBuffer(image.data)).metadata()
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new TileDecodeError(image.tile, reason, { cause: error })
	}
	if (metadata.width !== tileSize || metadata.height !== tileSize) {
		throw new TileDecodeError(
			image.tile,
			`expected ${tileSize}x${tileSize}, got ${metadata.width}x${metadata.height}`,
		)
	}
	return metadata
}

/**
 * Allocate a canvas for the grid and paste each tile at its offset. Tiles never overlap, so order does not matter.
 */
export async function createComposite(
	grid: TileGrid,
	tiles: TileImage[],
	options: Partial<CompositeOptions> = {},
): Promise<Composite> {
	const tileSize = options.tileSize ?? DEFAULT_TILE_SIZE
	assertCompositeSize(grid, tileSize)
	const [width, height] = gridPxSize(grid, tileSize)

	const overlays: sharp.OverlayOptions[] = tiles.map((image) => {
		if (!gridContains(grid, image.tile)) {
			throw Error(`Tile ${tileKey(image.tile)} is outside the grid`)
		}
		const [left, top] = gridTilePxOffset(grid, image.tile, tileSize)
		return { input: toBuffer(image.data), left, top }
	})

	let canvas = sharp({
		create: {
			width,
			height,
			channels: 3,
			background: options.background ?? DEFAULT_BACKGROUND,
		},
		limitInputPixels: false,
	})
	if (overlays.length > 0) canvas = canvas.composite(overlays)

	const { data, info } = await canvas
		.raw()
		.toBuffer({ resolveWithObject: true })
	return {
		grid,
		tileSize,
		width: info.width,
		height: info.height,
		channels: info.channels,
		data,
	}
}
