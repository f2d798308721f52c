import type { Tile, TileImage } from "@tilestitch/shared/types"
import sharp from "sharp"

export type RGB = [r: number, g: number, b: number]

export const RED: RGB = [255, 0, 0]
export const GREEN: RGB = [0, 255, 0]
export const BLUE: RGB = [0, 0, 255]
export const BLACK: RGB = [0, 0, 0]

export async function solidTile(
	tile: Tile,
	[r, g, b]: RGB,
	size = 256,
): Promise<TileImage> {
	const data = await sharp({
		create: { width: size, height: size, channels: 3, background: { r, g, b } },
	})
		.png()
		.toBuffer()
	return { tile, data }
}

export function pixelAt(
	data: Buffer,
	width: number,
	channels: number,
	x: number,
	y: number,
): RGB {
	const i = (y * width + x) * channels
	return [data[i] ?? -1, data[i + 1] ?? -1, data[i + 2] ?? -1]
}
