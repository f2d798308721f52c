export const DEFAULT_TILE_URL_TEMPLATE =
	"https://tile.openstreetmap.org/{z}/{x}/{y}.png"

/**
 * The OSM tile usage policy requires a User-Agent that identifies the application.
 */
export const DEFAULT_USER_AGENT =
	"tilestitch/0.1 (+https://operations.osmfoundation.org/policies/tiles/)"

export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_RETRIES = 2
export const DEFAULT_RETRY_DELAY_MS = 1_000

/**
 * Pause before every request to keep the load on the public tile servers low.
 */
export const DEFAULT_REQUEST_DELAY_MS = 300
