import { extname } from "node:path"
import {
	ImageWriteError,
	UnsupportedFormatError,
} from "@tilestitch/shared/errors"
import type sharp from "sharp"

export type ImageFormat = "png" | "jpeg"

export interface WrittenImage {
	path: string
	format: ImageFormat
	width: number
	height: number
	size: number
}

export function imageFormatForPath(path: string): ImageFormat {
	switch (extname(path).toLowerCase()) {
		case ".png":
			return "png"
		case ".jpg":
		case ".jpeg":
			return "jpeg"
		default:
			throw new UnsupportedFormatError(path)
	}
}

export function encodeImage(image: sharp.Sharp, format: ImageFormat) {
	return format === "png" ? image.png() : image.jpeg({ quality: 90 })
}

/**
 * Encode by file extension and write to disk.
 */
export async function writeImage(
	image: sharp.Sharp,
	path: string,
): Promise<WrittenImage> {
	const format = imageFormatForPath(path)
	try {
		const info = await encodeImage(image, format).toFile(path)
		return {
			path,
			format,
			width: info.width,
			height: info.height,
			size: info.size,
		}
	} catch (error) {
		throw new ImageWriteError(path, error)
	}
}
