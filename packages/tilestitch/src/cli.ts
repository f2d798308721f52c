import { assertValidTemplate, type TileFetcherOptions } from "@tilestitch/fetch"
import { parseCliArgs, USAGE, UsageError } from "./args"
import { confirm, TILE_USAGE_NOTICE } from "./notice"
import { createTerminalReporter, type OutputStream } from "./reporter"
import { planStitch, type StitchInput, stitchTiles } from "./stitch"

export interface CliIO {
	stdout: OutputStream
	stderr: OutputStream
	interactive: boolean
	confirm: (question: string) => Promise<boolean>
	// Replaces the global fetch for tile downloads
	fetch?: TileFetcherOptions["fetch"]
}

const processIO: CliIO = {
	stdout: process.stdout,
	stderr: process.stderr,
	interactive: Boolean(process.stdin.isTTY),
	confirm: (question) => confirm(question),
}

/**
 * Command line entry point. Resolves to the process exit code.
 */
export async function main(
	argv: string[],
	env: NodeJS.ProcessEnv = process.env,
	io: CliIO = processIO,
): Promise<number> {
	let command: ReturnType<typeof parseCliArgs>
	try {
		command = parseCliArgs(argv, env)
	} catch (error) {
		if (!(error instanceof UsageError)) throw error
		io.stderr.write(`Error: ${error.message}\n\n${USAGE}\n`)
		return 2
	}
	if (command.help) {
		io.stdout.write(`${USAGE}\n`)
		return 0
	}

	const { config } = command
	const reporter = createTerminalReporter(io.stdout, io.stderr, {
		verbose: config.verbose,
	})

	const options: StitchInput = {
		bbox: config.bbox,
		zoom: config.zoom,
		output: config.output,
		tileSize: config.tileSize,
		background: config.background,
		maxTiles: config.maxTiles,
		onTileError: config.onTileError,
		fetcherOptions: { ...config.fetcher, fetch: io.fetch, logger: reporter.log },
		logger: reporter.log,
	}

	try {
		const { grid } = await planStitch(options)
		assertValidTemplate(config.fetcher.urlTemplate)
		reporter.log(TILE_USAGE_NOTICE)
		reporter.log("")
		reporter.log(
			`${grid.tiles.length} tiles needed from ${new URL(config.fetcher.urlTemplate).host}`,
		)

		if (!config.yes) {
			if (!io.interactive) {
				reporter.log(
					"Error: confirmation required; pass --yes to download without a prompt",
					"error",
				)
				return 2
			}
			if (!(await io.confirm("Continue with download? (y/n): "))) {
				reporter.log("Download cancelled.")
				return 0
			}
		}

		const result = await stitchTiles(options, reporter.progress)
		reporter.done()
		reporter.log(`Tiles used: ${result.fetched}, failed: ${result.failed}`)
		reporter.log(`Final image size: ${result.width}x${result.height} pixels`)
		reporter.log(`Finished in ${(result.elapsedMs / 1_000).toFixed(1)}s`)
		return 0
	} catch (error) {
		reporter.log(
			`Error: ${error instanceof Error ? error.message : String(error)}`,
			"error",
		)
		return 1
	}
}
