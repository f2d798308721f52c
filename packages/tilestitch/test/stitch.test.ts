import { access, mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { TileFetcher } from "@tilestitch/fetch"
import {
	GridTooLargeError,
	InvalidBackgroundError,
	InvalidBboxError,
	NoTilesFetchedError,
	StitchAbortedError,
	TileDecodeError,
	TileFetchError,
	UnsupportedFormatError,
	UnsupportedZoomError,
} from "@tilestitch/shared/errors"
import { isCountProgress } from "@tilestitch/shared/progress"
import type { GeoBbox2D } from "@tilestitch/shared/types"
import sharp from "sharp"
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest"
import {
	planStitch,
	type StitchProgress,
	startStitch,
	stitchTiles,
} from "../src/stitch"

type RGB = [number, number, number]

const lowerManhattan: GeoBbox2D = [-74.02, 40.7, -73.97, 40.75]

const COLORS: Record<string, RGB> = {
	"1205/1539": [255, 0, 0],
	"1206/1539": [0, 255, 0],
	"1205/1540": [255, 255, 255],
	"1206/1540": [0, 0, 255],
}

async function solidPng([r, g, b]: RGB) {
	return sharp({
		create: { width: 256, height: 256, channels: 3, background: { r, g, b } },
	})
		.png()
		.toBuffer()
}

/**
 * In-process tile server. `override` can replace the response for a "x/y" key.
 */
function createTileServer(
	override: (key: string) => Response | undefined = () => undefined,
) {
	return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
		const match = /\/12\/(\d+)\/(\d+)\.png$/.exec(String(input))
		const key = match ? `${match[1]}/${match[2]}` : ""
		const replaced = override(key)
		if (replaced) return replaced
		const color = COLORS[key]
		if (!color) return new Response(null, { status: 404 })
		return new Response(await solidPng(color), {
			status: 200,
			headers: { "content-type": "image/png" },
		})
	})
}

function createFetcher(server: ReturnType<typeof createTileServer>) {
	return new TileFetcher({
		urlTemplate: "https://tiles.test/{z}/{x}/{y}.png",
		fetch: server,
		sleep: async () => {},
		requestDelayMs: 0,
		retries: 0,
	})
}

async function readPixels(path: string) {
	const { data, info } = await sharp(path)
		.raw()
		.toBuffer({ resolveWithObject: true })
	return (x: number, y: number): RGB => {
		const i = (y * info.width + x) * info.channels
		return [data[i] ?? -1, data[i + 1] ?? -1, data[i + 2] ?? -1]
	}
}

describe("stitchTiles", () => {
	let dir: string

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "tilestitch-"))
	})

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("downloads, stitches and crops the bounding box", async () => {
		const server = createTileServer()
		const output = join(dir, "manhattan.png")
		const updates: StitchProgress[] = []
		const result = await stitchTiles(
			{
				bbox: lowerManhattan,
				zoom: 12,
				output,
				fetcher: createFetcher(server),
				logger: vi.fn(),
			},
			(p) => updates.push(p),
		)

		expect(result).toMatchObject({
			path: output,
			width: 146,
			height: 193,
			fetched: 4,
			failed: 0,
			failures: [],
		})
		expect(result.grid.cols * 256).toBe(512)
		expect(server).toHaveBeenCalledTimes(4)

		expect(updates.filter((p) => !isCountProgress(p)).map((p) => p.msg)).toEqual([
			"Calculating required tiles...",
			"Need to download 4 tiles (2x2 at zoom 12)",
			"Downloaded 4 tiles successfully, 0 failed",
			"Stitching tiles...",
			"Cropping image to exact coordinates...",
			`Saved ${output} (146x193 pixels)`,
		])
		const tileUpdates = updates.filter(isCountProgress)
		expect(tileUpdates.map((p) => [p.completed, p.total, p.percent])).toEqual([
			[1, 4, 25],
			[2, 4, 50],
			[3, 4, 75],
			[4, 4, 100],
		])
		expect(tileUpdates[0]?.msg).toMatch(
			/^Downloading tile 1\/4 \(25\.0%\) - \d+\.\d tiles\/sec$/,
		)

		const pixel = await readPixels(output)
		expect(pixel(0, 0)).toEqual([255, 0, 0])
		expect(pixel(100, 0)).toEqual([0, 255, 0])
		expect(pixel(0, 150)).toEqual([255, 255, 255])
		expect(pixel(145, 192)).toEqual([0, 0, 255])
	})

	it("leaves a blank region where a tile returns 404", async () => {
		const server = createTileServer((key) =>
			key === "1205/1540" ? new Response("gone", { status: 404 }) : undefined,
		)
		const logger = vi.fn()
		const output = join(dir, "blank.png")
		const result = await stitchTiles(
			{
				bbox: lowerManhattan,
				zoom: 12,
				output,
				fetcher: createFetcher(server),
				logger,
			},
			() => {},
		)

		expect(result.fetched).toBe(3)
		expect(result.failed).toBe(1)
		const [failure] = result.failures
		expect(failure).toBeInstanceOf(TileFetchError)
		expect(failure instanceof TileFetchError && failure.status).toBe(404)
		expect(logger).toHaveBeenCalledWith(
			"Failed to fetch https://tiles.test/12/1205/1540.png: HTTP 404",
			"warn",
		)

		const pixel = await readPixels(output)
		expect(pixel(0, 150)).toEqual([0, 0, 0])
		expect(pixel(100, 150)).toEqual([0, 0, 255])
	})

	it("fills failed tiles with the chosen background", async () => {
		const server = createTileServer((key) =>
			key === "1205/1540" ? new Response(null, { status: 500 }) : undefined,
		)
		const output = join(dir, "background.png")
		await stitchTiles(
			{
				bbox: lowerManhattan,
				zoom: 12,
				output,
				background: "#ff00ff",
				fetcher: createFetcher(server),
				logger: vi.fn(),
			},
			() => {},
		)
		expect((await readPixels(output))(0, 150)).toEqual([255, 0, 255])
	})

	it("counts a tile that is not an image as failed", async () => {
		const server = createTileServer((key) =>
			key === "1206/1539"
				? new Response(new Uint8Array([1, 2, 3]), {
						status: 200,
						headers: { "content-type": "image/png" },
					})
				: undefined,
		)
		const result = await stitchTiles(
			{
				bbox: lowerManhattan,
				zoom: 12,
				output: join(dir, "corrupt.png"),
				fetcher: createFetcher(server),
				logger: vi.fn(),
			},
			() => {},
		)
		expect(result.failed).toBe(1)
		expect(result.failures[0]).toBeInstanceOf(TileDecodeError)
	})

	it("aborts on the first failed tile when asked", async () => {
		const server = createTileServer((key) =>
			key === "1206/1539" ? new Response(null, { status: 404 }) : undefined,
		)
		const output = join(dir, "aborted.png")
		const run = stitchTiles(
			{
				bbox: lowerManhattan,
				zoom: 12,
				output,
				onTileError: "abort",
				fetcher: createFetcher(server),
				logger: vi.fn(),
			},
			() => {},
		)
		await expect(run).rejects.toBeInstanceOf(StitchAbortedError)
		await expect(run).rejects.toThrow(
			"Aborted: Failed to fetch https://tiles.test/12/1206/1539.png: HTTP 404",
		)
		// Stops at the failed tile
		expect(server).toHaveBeenCalledTimes(2)
		await expect(access(output)).rejects.toThrow()
	})

	it("fails when no tile could be fetched", async () => {
		const server = createTileServer(() => new Response(null, { status: 404 }))
		const output = join(dir, "empty.png")
		await expect(
			stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 12,
					output,
					fetcher: createFetcher(server),
					logger: vi.fn(),
				},
				() => {},
			),
		).rejects.toThrow(
			new NoTilesFetchedError(lowerManhattan, 12, 4).message,
		)
		await expect(access(output)).rejects.toThrow()
	})

	it("rejects an unsupported zoom before any request", async () => {
		const server = createTileServer()
		await expect(
			stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 25,
					output: join(dir, "zoom.png"),
					fetcher: createFetcher(server),
					logger: vi.fn(),
				},
				() => {},
			),
		).rejects.toBeInstanceOf(UnsupportedZoomError)
		expect(server).not.toHaveBeenCalled()
	})

	it("rejects an unsupported output format before any request", async () => {
		const server = createTileServer()
		await expect(
			stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 12,
					output: join(dir, "map.gif"),
					fetcher: createFetcher(server),
					logger: vi.fn(),
				},
				() => {},
			),
		).rejects.toBeInstanceOf(UnsupportedFormatError)
		expect(server).not.toHaveBeenCalled()
	})

	it("rejects a box that covers no pixels before any request", async () => {
		const server = createTileServer()
		const run = stitchTiles(
			{
				bbox: [10, 10, 10.0001, 10.0001],
				zoom: 3,
				output: join(dir, "tiny.png"),
				fetcher: createFetcher(server),
				logger: vi.fn(),
			},
			() => {},
		)
		await expect(run).rejects.toBeInstanceOf(InvalidBboxError)
		await expect(run).rejects.toThrow(
			"Invalid bounding box [10, 10, 10.0001, 10.0001]: covers no pixels of the 256x256 composite at zoom 3",
		)
		expect(server).not.toHaveBeenCalled()
	})

	it("rejects an unknown background colour before any request", async () => {
		const server = createTileServer()
		await expect(
			stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 12,
					output: join(dir, "colour.png"),
					background: "notacolour",
					fetcher: createFetcher(server),
					logger: vi.fn(),
				},
				() => {},
			),
		).rejects.toBeInstanceOf(InvalidBackgroundError)
		expect(server).not.toHaveBeenCalled()
	})

	it("refuses a grid over the tile limit before any request", async () => {
		const server = createTileServer()
		await expect(
			stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 12,
					output: join(dir, "limit.png"),
					maxTiles: 3,
					fetcher: createFetcher(server),
					logger: vi.fn(),
				},
				() => {},
			),
		).rejects.toBeInstanceOf(GridTooLargeError)
		expect(server).not.toHaveBeenCalled()
	})

	it("writes identical bytes on repeated runs", async () => {
		const paths = [join(dir, "run-1.png"), join(dir, "run-2.png")]
		for (const output of paths) {
			await stitchTiles(
				{
					bbox: lowerManhattan,
					zoom: 12,
					output,
					fetcher: createFetcher(createTileServer()),
					logger: vi.fn(),
				},
				() => {},
			)
		}
		const [first, second] = await Promise.all(paths.map((p) => readFile(p)))
		expect(first?.equals(second ?? Buffer.alloc(0))).toBe(true)
	})
})

describe("startStitch", () => {
	it("yields progress before doing any work", async () => {
		const server = createTileServer()
		const stitching = startStitch({
			bbox: lowerManhattan,
			zoom: 12,
			output: join(tmpdir(), "never-written.png"),
			fetcher: createFetcher(server),
			logger: vi.fn(),
		})
		const first = await stitching.next()
		expect(first.done).toBe(false)
		expect(first.value).toMatchObject({ msg: "Calculating required tiles..." })
		expect(server).not.toHaveBeenCalled()
	})
})

describe("planStitch", () => {
	it("returns the grid, crop rectangle and output format", async () => {
		const plan = await planStitch({
			bbox: lowerManhattan,
			zoom: 12,
			output: "map.jpg",
		})
		expect([plan.grid.minX, plan.grid.minY, plan.grid.cols, plan.grid.rows]).toEqual([
			1205, 1539, 2, 2,
		])
		expect(plan.crop).toEqual([209, 117, 355, 310])
		expect(plan.format).toBe("jpeg")
	})
})
