import { createInterface } from "node:readline/promises"

export const TILE_USAGE_NOTICE = [
	"OpenStreetMap tile usage policy",
	"- Bulk downloading from tile.openstreetmap.org is discouraged; keep areas and zoom levels small",
	"- For heavy use, pick another tile provider or run your own tile server",
	"- Requests are spaced out and identify this tool with a User-Agent",
	"- See https://operations.osmfoundation.org/policies/tiles/",
].join("\n")

export function isYes(answer: string) {
	const normalized = answer.trim().toLowerCase()
	return normalized === "y" || normalized === "yes"
}

/**
 * Ask a yes/no question on the terminal.
 */
export async function confirm(
	question: string,
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
	const rl = createInterface({ input, output })
	try {
		return isYes(await rl.question(question))
	} finally {
		rl.close()
	}
}
