import { readFileSync } from "fs"

import { z } from "zod"

const packageJsonSchema = z.object({
	name: z.string(),
	version: z.string(),
})

export const Package = packageJsonSchema.parse(
	JSON.parse(readFileSync(new URL("../../../package.json", import.meta.url), "utf8")),
)
