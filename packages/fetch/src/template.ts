import { InvalidTemplateError } from "@tilestitch/shared/errors"
import type { Tile } from "@tilestitch/shared/types"

const PLACEHOLDERS = ["{z}", "{x}", "{y}"] as const

export function assertValidTemplate(template: string) {
	const missing = PLACEHOLDERS.filter((p) => !template.includes(p))
	if (missing.length > 0) {
		throw new InvalidTemplateError(template, `missing ${missing.join(", ")}`)
	}
	let url: URL
	try {
		url = new URL(template)
	} catch {
		throw new InvalidTemplateError(template, "not an absolute URL")
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new InvalidTemplateError(template, "protocol must be http or https")
	}
}

/**
 * Build the URL of a tile from a `{z}/{x}/{y}` template.
 */
export function tileUrl(template: string, tile: Tile): string {
	const [x, y, z] = tile
	return template
		.replaceAll("{z}", String(z))
		.replaceAll("{x}", String(x))
		.replaceAll("{y}", String(y))
}
