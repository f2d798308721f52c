export const DEFAULT_ZOOM = 10
export const DEFAULT_OUTPUT = "osm_export_map.png"

export type TileErrorPolicy = "blank" | "abort"
export const TILE_ERROR_POLICIES: readonly TileErrorPolicy[] = [
	"blank",
	"abort",
]
export const DEFAULT_TILE_ERROR_POLICY: TileErrorPolicy = "blank"

export const ENV_TILE_URL = "TILESTITCH_TILE_URL"
export const ENV_USER_AGENT = "TILESTITCH_USER_AGENT"
