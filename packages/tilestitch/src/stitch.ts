import { TileFetcher, type TileFetcherOptions } from "@tilestitch/fetch"
import {
	bboxToCropPx,
	bboxToTileGrid,
	type ZoomRange,
} from "@tilestitch/grid"
import {
	assertCompositeSize,
	assertValidBackground,
	type Background,
	createComposite,
	cropComposite,
	DEFAULT_BACKGROUND,
	DEFAULT_TILE_SIZE,
	decodeTileImage,
	type ImageFormat,
	imageFormatForPath,
	writeImage,
} from "@tilestitch/mosaic"
import {
	NoTilesFetchedError,
	StitchAbortedError,
	TileDecodeError,
	type TileFetchError,
} from "@tilestitch/shared/errors"
import { createConsoleLogger } from "@tilestitch/shared/log"
import {
	type CountProgress,
	countProgress,
	logProgress,
	type Progress,
	progress,
} from "@tilestitch/shared/progress"
import type {
	GeoBbox2D,
	Logger,
	PxBbox,
	Tile,
	TileGrid,
	TileImage,
} from "@tilestitch/shared/types"
import {
	DEFAULT_OUTPUT,
	DEFAULT_TILE_ERROR_POLICY,
	type TileErrorPolicy,
} from "./settings"

export interface StitchOptions {
	bbox: GeoBbox2D
	zoom: number
	output: string
	tileSize: number
	background: Background
	onTileError: TileErrorPolicy
	zoomRange: ZoomRange
	maxTiles: number
	// Used as-is when given, otherwise built from `fetcherOptions`
	fetcher: TileFetcher
	fetcherOptions: Partial<TileFetcherOptions>
	logger: Logger
}

export type TileProgress = CountProgress & {
	tile: Tile
	ok: boolean
}

export type StitchProgress = Progress | TileProgress

export type StitchInput = Partial<StitchOptions> &
	Pick<StitchOptions, "bbox" | "zoom">

export interface StitchPlan {
	grid: TileGrid
	crop: PxBbox
	format: ImageFormat
}

export type TileFailure = TileFetchError | TileDecodeError

export interface StitchResult {
	grid: TileGrid
	path: string
	width: number
	height: number
	fetched: number
	failed: number
	failures: TileFailure[]
	elapsedMs: number
}

async function checkTile(
	image: TileImage,
	tileSize: number,
): Promise<TileDecodeError | null> {
	try {
		await decodeTileImage(image, tileSize)
		return null
	} catch (error) {
		if (error instanceof TileDecodeError) return error
		throw error
	}
}

/**
 * Check every input that would otherwise fail after the download: the grid and its size, the crop rectangle, the
 * output format and the background colour.
 */
export async function planStitch(options: StitchInput): Promise<StitchPlan> {
	const tileSize = options.tileSize ?? DEFAULT_TILE_SIZE
	const grid = bboxToTileGrid(options.bbox, options.zoom, {
		...options.zoomRange,
		maxTiles: options.maxTiles,
	})
	assertCompositeSize(grid, tileSize)
	const crop = bboxToCropPx(options.bbox, grid, tileSize)
	const format = imageFormatForPath(options.output ?? DEFAULT_OUTPUT)
	await assertValidBackground(options.background ?? DEFAULT_BACKGROUND)
	return { grid, crop, format }
}

/**
 * Run the whole pipeline: tile grid, downloads, composite, crop and write. Yields progress as it goes and returns a
 * summary once the image is on disk.
 */
export async function* startStitch(
	options: StitchInput,
): AsyncGenerator<StitchProgress, StitchResult> {
	const startTime = Date.now()
	const { bbox, zoom } = options
	const output = options.output ?? DEFAULT_OUTPUT
	const tileSize = options.tileSize ?? DEFAULT_TILE_SIZE
	const onTileError = options.onTileError ?? DEFAULT_TILE_ERROR_POLICY
	const log = options.logger ?? createConsoleLogger()

	yield progress("Calculating required tiles...")
	const { grid } = await planStitch(options)
	const total = grid.tiles.length
	yield progress(
		`Need to download ${total} tiles (${grid.cols}x${grid.rows} at zoom ${zoom})`,
	)

	const fetcher =
		options.fetcher ??
		new TileFetcher({ logger: log, ...options.fetcherOptions })
	const images: TileImage[] = []
	const failures: TileFailure[] = []
	const fetchStart = Date.now()
	let completed = 0

	for await (const result of fetcher.fetchTiles(grid.tiles)) {
		completed++
		const tile = result.ok ? result.image.tile : result.tile
		const failure = result.ok
			? await checkTile(result.image, tileSize)
			: result.error
		if (failure) {
			if (onTileError === "abort") throw new StitchAbortedError(failure)
			log(failure.message, "warn")
			failures.push(failure)
		} else if (result.ok) {
			images.push(result.image)
		}
		const p = countProgress("", completed, total, fetchStart)
		yield {
			...p,
			msg: `Downloading tile ${completed}/${total} (${p.percent.toFixed(1)}%) - ${p.itemsPerSecond.toFixed(1)} tiles/sec`,
			tile,
			ok: failure == null,
		}
	}

	if (images.length === 0) {
		throw new NoTilesFetchedError(bbox, zoom, failures.length)
	}
	yield progress(
		`Downloaded ${images.length} tiles successfully, ${failures.length} failed`,
	)

	yield progress("Stitching tiles...")
	const composite = await createComposite(grid, images, {
		tileSize,
		background: options.background ?? DEFAULT_BACKGROUND,
	})

	yield progress("Cropping image to exact coordinates...")
	const written = await writeImage(cropComposite(composite, bbox).image, output)
	yield progress(
		`Saved ${written.path} (${written.width}x${written.height} pixels)`,
	)

	return {
		grid,
		path: written.path,
		width: written.width,
		height: written.height,
		fetched: images.length,
		failed: failures.length,
		failures,
		elapsedMs: Date.now() - startTime,
	}
}

/**
 * Run the pipeline to completion, forwarding every progress update to `onProgress`.
 */
export async function stitchTiles(
	options: StitchInput,
	onProgress: (progress: StitchProgress) => void = logProgress,
): Promise<StitchResult> {
	const stitching = startStitch(options)
	while (true) {
		const next = await stitching.next()
		if (next.done) return next.value
		onProgress(next.value)
	}
}
