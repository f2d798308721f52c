/**
 * Error types raised by tilestitch packages.
 *
 * Every error carries a stable `code` so callers can branch without matching on messages.
 *
 * @module
 */

import type { GeoBbox2D, Tile } from "./types"

export type TileStitchErrorCode =
	| "INVALID_BBOX"
	| "UNSUPPORTED_ZOOM"
	| "GRID_TOO_LARGE"
	| "INVALID_BACKGROUND"
	| "INVALID_TEMPLATE"
	| "TILE_FETCH_FAILED"
	| "TILE_DECODE_FAILED"
	| "UNSUPPORTED_FORMAT"
	| "IMAGE_WRITE_FAILED"
	| "STITCH_ABORTED"
	| "NO_TILES_FETCHED"

export class TileStitchError extends Error {
	readonly code: TileStitchErrorCode

	constructor(
		code: TileStitchErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options)
		this.name = new.target.name
		this.code = code
	}
}

export class InvalidBboxError extends TileStitchError {
	readonly bbox: readonly number[]

	constructor(bbox: readonly number[], reason: string) {
		super("INVALID_BBOX", `Invalid bounding box [${bbox.join(", ")}]: ${reason}`)
		this.bbox = bbox
	}
}

export class UnsupportedZoomError extends TileStitchError {
	readonly zoom: number

	constructor(zoom: number, minZoom: number, maxZoom: number) {
		super(
			"UNSUPPORTED_ZOOM",
			`Unsupported zoom ${zoom}: expected an integer from ${minZoom} to ${maxZoom}`,
		)
		this.zoom = zoom
	}
}

export class GridTooLargeError extends TileStitchError {
	constructor(reason: string) {
		super("GRID_TOO_LARGE", `Tile grid too large: ${reason}`)
	}
}

export class InvalidBackgroundError extends TileStitchError {
	constructor(background: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause)
		super(
			"INVALID_BACKGROUND",
			`Invalid background colour "${background}": ${reason}`,
			{ cause },
		)
	}
}

export class InvalidTemplateError extends TileStitchError {
	constructor(template: string, reason: string) {
		super("INVALID_TEMPLATE", `Invalid tile URL template "${template}": ${reason}`)
	}
}

export class TileFetchError extends TileStitchError {
	readonly tile: Tile
	readonly url: string
	readonly status?: number
	readonly attempts: number

	constructor(
		tile: Tile,
		url: string,
		reason: string,
		details: { status?: number; attempts: number; cause?: unknown },
	) {
		super("TILE_FETCH_FAILED", `Failed to fetch ${url}: ${reason}`, {
			cause: details.cause,
		})
		this.tile = tile
		this.url = url
		this.status = details.status
		this.attempts = details.attempts
	}
}

export class TileDecodeError extends TileStitchError {
	readonly tile: Tile

	constructor(tile: Tile, reason: string, options?: ErrorOptions) {
		super("TILE_DECODE_FAILED", `Tile ${tile.join("/")} is unusable: ${reason}`, options)
		this.tile = tile
	}
}

export class UnsupportedFormatError extends TileStitchError {
	constructor(path: string) {
		super(
			"UNSUPPORTED_FORMAT",
			`Cannot write ${path}: output must end in .png, .jpg or .jpeg`,
		)
	}
}

export class ImageWriteError extends TileStitchError {
	readonly path: string

	constructor(path: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause)
		super("IMAGE_WRITE_FAILED", `Failed to write ${path}: ${reason}`, { cause })
		this.path = path
	}
}

export class StitchAbortedError extends TileStitchError {
	constructor(cause: TileFetchError | TileDecodeError) {
		super("STITCH_ABORTED", `Aborted: ${cause.message}`, { cause })
	}
}

export class NoTilesFetchedError extends TileStitchError {
	constructor(bbox: GeoBbox2D, zoom: number, failed: number) {
		super(
			"NO_TILES_FETCHED",
			`No tiles could be fetched for [${bbox.join(", ")}] at zoom ${zoom} (${failed} failed)`,
		)
	}
}
