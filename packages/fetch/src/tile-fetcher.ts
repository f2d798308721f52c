import { setTimeout as sleep } from "node:timers/promises"
import { TileFetchError } from "@tilestitch/shared/errors"
import { tileKey } from "@tilestitch/shared/tile"
import type { Logger, Tile, TileImage } from "@tilestitch/shared/types"
import {
	DEFAULT_REQUEST_DELAY_MS,
	DEFAULT_RETRIES,
	DEFAULT_RETRY_DELAY_MS,
	DEFAULT_TILE_URL_TEMPLATE,
	DEFAULT_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
} from "./settings"
import { assertValidTemplate, tileUrl } from "./template"

export interface TileFetcherOptions {
	urlTemplate: string
	userAgent: string
	timeoutMs: number
	// Extra attempts after the first one
	retries: number
	retryDelayMs: number
	requestDelayMs: number
	fetch: typeof fetch
	sleep: (ms: number) => Promise<unknown>
	logger: Logger
}

export type TileFetchResult =
	| { ok: true; image: TileImage; attempts: number }
	| { ok: false; tile: Tile; url: string; error: TileFetchError }

type AttemptResult =
	| { ok: true; data: Uint8Array }
	| {
			ok: false
			reason: string
			retryable: boolean
			status?: number
			cause?: unknown
	  }

function isRetryableStatus(status: number) {
	return status === 408 || status === 429 || status >= 500
}

/**
 * Downloads tiles one request at a time.
 *
 * A failed tile is returned as a result, never thrown, so the caller decides whether one missing tile
 * ends the run.
 */
export class TileFetcher {
	readonly urlTemplate: string
	readonly userAgent: string
	readonly timeoutMs: number
	readonly retries: number
	readonly retryDelayMs: number
	readonly requestDelayMs: number

	#fetch: typeof fetch
	#sleep: (ms: number) => Promise<unknown>
	#log: Logger

	constructor(options: Partial<TileFetcherOptions> = {}) {
		this.urlTemplate = options.urlTemplate ?? DEFAULT_TILE_URL_TEMPLATE
		assertValidTemplate(this.urlTemplate)
		this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
		this.retries = Math.max(0, options.retries ?? DEFAULT_RETRIES)
		this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
		this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS
		this.#fetch = options.fetch ?? fetch
		this.#sleep = options.sleep ?? sleep
		this.#log = options.logger ?? (() => {})
	}

	url(tile: Tile) {
		return tileUrl(this.urlTemplate, tile)
	}

	async fetchTile(tile: Tile): Promise<TileFetchResult> {
		const url = this.url(tile)
		let attempts = 0
		while (true) {
			attempts++
			const result = await this.#attempt(url)
			if (result.ok) {
				return {
					ok: true,
					attempts,
					image: { tile, data: result.data },
				}
			}
			if (!result.retryable || attempts > this.retries) {
				return {
					ok: false,
					tile,
					url,
					error: new TileFetchError(tile, url, result.reason, {
						status: result.status,
						attempts,
						cause: result.cause,
					}),
				}
			}
			this.#log(
				`Retrying tile ${tileKey(tile)} after ${result.reason} (attempt ${attempts + 1} of ${this.retries + 1})`,
				"debug",
			)
			await this.#sleep(this.retryDelayMs * attempts)
		}
	}

	/**
	 * Fetch tiles in order, yielding each result as soon as it completes.
	 */
	async *fetchTiles(tiles: Iterable<Tile>): AsyncGenerator<TileFetchResult> {
		for (const tile of tiles) {
			yield await this.fetchTile(tile)
		}
	}

	async #attempt(url: string): Promise<AttemptResult> {
		if (this.requestDelayMs > 0) await this.#sleep(this.requestDelayMs)
		try {
			const response = await this.#fetch(url, {
				headers: {
					"User-Agent": this.userAgent,
					Accept: "image/png,image/jpeg,image/*;q=0.8",
				},
				signal: AbortSignal.timeout(this.timeoutMs),
			})
			if (response.status !== 200) {
				await response.body?.cancel()
				return {
					ok: false,
					status: response.status,
					reason: `HTTP ${response.status}`,
					retryable: isRetryableStatus(response.status),
				}
			}
			const contentType = response.headers.get("content-type") ?? undefined
			if (contentType != null && !contentType.startsWith("image/")) {
				await response.body?.cancel()
				return {
					ok: false,
					status: response.status,
					reason: `unexpected content type ${contentType}`,
					retryable: false,
				}
			}
			const data = new Uint8Array(await response.arrayBuffer())
			if (data.byteLength === 0) {
				return { ok: false, status: 200, reason: "empty body", retryable: true }
			}
			return { ok: true, data }
		} catch (error) {
			if (error instanceof Error && error.name === "TimeoutError") {
				return {
					ok: false,
					reason: `timed out after ${this.timeoutMs}ms`,
					retryable: true,
					cause: error,
				}
			}
			return {
				ok: false,
				reason: error instanceof Error ? error.message : String(error),
				retryable: true,
				cause: error,
			}
		}
	}
}
