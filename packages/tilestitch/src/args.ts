import { parseArgs } from "node:util"
import {
	DEFAULT_REQUEST_DELAY_MS,
	DEFAULT_RETRIES,
	DEFAULT_TILE_URL_TEMPLATE,
	DEFAULT_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
	type TileFetcherOptions,
} from "@tilestitch/fetch"
import { DEFAULT_MAX_TILES } from "@tilestitch/grid"
import { DEFAULT_BACKGROUND, DEFAULT_TILE_SIZE } from "@tilestitch/mosaic"
import type { GeoBbox2D } from "@tilestitch/shared/types"
import {
	DEFAULT_OUTPUT,
	DEFAULT_TILE_ERROR_POLICY,
	DEFAULT_ZOOM,
	ENV_TILE_URL,
	ENV_USER_AGENT,
	TILE_ERROR_POLICIES,
	type TileErrorPolicy,
} from "./settings"

export class UsageError extends Error {
	override name = "UsageError"
}

export const USAGE = `Usage: tilestitch --bbox=<minLon,minLat,maxLon,maxLat> [options]

Download OpenStreetMap raster tiles covering a bounding box, stitch them
together and crop the result to the exact box.

Bounding box (one form is required):
  -b, --bbox=<minLon,minLat,maxLon,maxLat>
      --min-lon=<deg> --min-lat=<deg> --max-lon=<deg> --max-lat=<deg>
  Use the --flag=value form for negative numbers.

Options:
  -z, --zoom <n>          Zoom level, 0-19 (default ${DEFAULT_ZOOM})
  -o, --output <path>     Output image, .png or .jpg (default ${DEFAULT_OUTPUT})
      --url <template>    Tile URL template with {z}, {x}, {y}
                          (default ${DEFAULT_TILE_URL_TEMPLATE}, env ${ENV_TILE_URL})
      --user-agent <ua>   User-Agent sent to the tile server (env ${ENV_USER_AGENT})
      --timeout <ms>      Per-request timeout (default ${DEFAULT_TIMEOUT_MS})
      --retries <n>       Extra attempts for a failing tile (default ${DEFAULT_RETRIES})
      --delay <ms>        Pause before each request (default ${DEFAULT_REQUEST_DELAY_MS})
      --tile-size <px>    Tile edge length in pixels (default ${DEFAULT_TILE_SIZE})
      --background <css>  Colour left where a tile is missing (default ${DEFAULT_BACKGROUND})
      --max-tiles <n>     Refuse grids with more tiles than this (default ${DEFAULT_MAX_TILES})
      --on-error <mode>   blank: leave failed tiles blank, abort: stop (default ${DEFAULT_TILE_ERROR_POLICY})
  -y, --yes               Skip the tile usage confirmation
  -v, --verbose           Print retries and other details
  -h, --help              Show this help`

const CLI_OPTIONS = {
	bbox: { type: "string", short: "b" },
	"min-lon": { type: "string" },
	"min-lat": { type: "string" },
	"max-lon": { type: "string" },
	"max-lat": { type: "string" },
	zoom: { type: "string", short: "z" },
	output: { type: "string", short: "o" },
	url: { type: "string" },
	"user-agent": { type: "string" },
	timeout: { type: "string" },
	retries: { type: "string" },
	delay: { type: "string" },
	"tile-size": { type: "string" },
	background: { type: "string" },
	"max-tiles": { type: "string" },
	"on-error": { type: "string" },
	yes: { type: "boolean", short: "y" },
	verbose: { type: "boolean", short: "v" },
	help: { type: "boolean", short: "h" },
} as const

export interface CliConfig {
	bbox: GeoBbox2D
	zoom: number
	output: string
	tileSize: number
	background: string
	maxTiles: number
	onTileError: TileErrorPolicy
	fetcher: Pick<
		TileFetcherOptions,
		"urlTemplate" | "userAgent" | "timeoutMs" | "retries" | "requestDelayMs"
	>
	yes: boolean
	verbose: boolean
}

export type CliCommand = { help: true } | { help: false; config: CliConfig }

function parseNumber(flag: string, value: string): number {
	const n = Number(value)
	if (value.trim() === "" || !Number.isFinite(n)) {
		throw new UsageError(`--${flag} must be a number, got "${value}"`)
	}
	return n
}

function parseCount(flag: string, value: string | undefined, fallback: number) {
	if (value === undefined) return fallback
	const n = parseNumber(flag, value)
	if (!Number.isInteger(n) || n < 0) {
		throw new UsageError(`--${flag} must be a whole number, got "${value}"`)
	}
	return n
}

function parseBbox(values: {
	bbox?: string
	"min-lon"?: string
	"min-lat"?: string
	"max-lon"?: string
	"max-lat"?: string
}): GeoBbox2D {
	const corners = ["min-lon", "min-lat", "max-lon", "max-lat"] as const
	const given = corners.filter((flag) => values[flag] !== undefined)

	if (values.bbox !== undefined) {
		if (given.length > 0) {
			throw new UsageError("use either --bbox or the --min/--max flags, not both")
		}
		const parts = values.bbox.split(",")
		if (parts.length !== 4) {
			throw new UsageError(
				`--bbox must be minLon,minLat,maxLon,maxLat, got "${values.bbox}"`,
			)
		}
		const [minLon = "", minLat = "", maxLon = "", maxLat = ""] = parts
		return [
			parseNumber("bbox", minLon),
			parseNumber("bbox", minLat),
			parseNumber("bbox", maxLon),
			parseNumber("bbox", maxLat),
		]
	}

	if (given.length === 0) {
		throw new UsageError("a bounding box is required")
	}
	const missing = corners.filter((flag) => values[flag] === undefined)
	if (missing.length > 0) {
		throw new UsageError(
			`missing ${missing.map((flag) => `--${flag}`).join(", ")}`,
		)
	}
	return [
		parseNumber("min-lon", values["min-lon"] ?? ""),
		parseNumber("min-lat", values["min-lat"] ?? ""),
		parseNumber("max-lon", values["max-lon"] ?? ""),
		parseNumber("max-lat", values["max-lat"] ?? ""),
	]
}

function isTileErrorPolicy(value: string): value is TileErrorPolicy {
	return TILE_ERROR_POLICIES.some((policy) => policy === value)
}

function parseFlags(argv: string[]) {
	try {
		return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true }).values
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error))
	}
}

/**
 * Turn command line arguments into a run configuration. Flags win over environment variables, which win over defaults.
 */
export function parseCliArgs(
	argv: string[],
	env: NodeJS.ProcessEnv = process.env,
): CliCommand {
	const values = parseFlags(argv)
	if (values.help) return { help: true }

	const onTileError = values["on-error"] ?? DEFAULT_TILE_ERROR_POLICY
	if (!isTileErrorPolicy(onTileError)) {
		throw new UsageError(
			`--on-error must be one of ${TILE_ERROR_POLICIES.join(", ")}, got "${onTileError}"`,
		)
	}

	const tileSize = parseCount("tile-size", values["tile-size"], DEFAULT_TILE_SIZE)
	if (tileSize === 0) throw new UsageError("--tile-size must be positive")
	const maxTiles = parseCount("max-tiles", values["max-tiles"], DEFAULT_MAX_TILES)
	if (maxTiles === 0) throw new UsageError("--max-tiles must be positive")

	return {
		help: false,
		config: {
			bbox: parseBbox(values),
			zoom:
				values.zoom === undefined
					? DEFAULT_ZOOM
					: parseNumber("zoom", values.zoom),
			output: values.output ?? DEFAULT_OUTPUT,
			tileSize,
			background: values.background ?? DEFAULT_BACKGROUND,
			maxTiles,
			onTileError,
			fetcher: {
				urlTemplate:
					values.url ?? (env[ENV_TILE_URL] || DEFAULT_TILE_URL_TEMPLATE),
				userAgent:
					values["user-agent"] ?? (env[ENV_USER_AGENT] || DEFAULT_USER_AGENT),
				timeoutMs: parseCount("timeout", values.timeout, DEFAULT_TIMEOUT_MS),
				retries: parseCount("retries", values.retries, DEFAULT_RETRIES),
				requestDelayMs: parseCount(
					"delay",
					values.delay,
					DEFAULT_REQUEST_DELAY_MS,
				),
			},
			yes: values.yes ?? false,
			verbose: values.verbose ?? false,
		},
	}
}
