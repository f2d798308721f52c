import { bboxToCropPx } from "@tilestitch/grid"
import type { GeoBbox2D, PxBbox } from "@tilestitch/shared/types"
import sharp from "sharp"
import type { Composite } from "./composite"

export interface CroppedImage {
	image: sharp.Sharp
	px: PxBbox
	width: number
	height: number
}

/**
 * Cut the requested bounding box out of a composite. The result has no alpha channel.
 */
export function cropComposite(
	composite: Composite,
	bbox: GeoBbox2D,
): CroppedImage {
	const px = bboxToCropPx(bbox, composite.grid, composite.tileSize)
	const [left, top, right, bottom] = px
	const width = right - left
	const height = bottom - top
	const image = sharp(composite.data, {
		raw: {
			width: composite.width,
			height: composite.height,
			channels: composite.channels,
		},
		limitInputPixels: false,
	})
		.extract({ left, top, width, height })
		.removeAlpha()
	return { image, px, width, height }
}
