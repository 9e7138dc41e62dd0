import { z } from "zod"

import { ruleDefinitionSchema, tagRuleSchema } from "./rules"

/**
 * Driver pack schema (YAML, repo-local or bundled)
 *
 * A driver bundles the vendor options and behavior rules that the engine
 * compiles into a RuleSet before any comparison runs.
 */

export const driverDefinitionVersion = 1 as const

export const substitutionSchema = z
	.object({
		/**
		 * Regular expression; replacement uses JavaScript `$1` syntax.
		 */
		search: z.string(),
		replace: z.string(),
	})
	.strict()

export type SubstitutionDefinition = z.infer<typeof substitutionSchema>

export const driverDefinitionSchema = z
	.object({
		version: z.literal(driverDefinitionVersion),
		platform: z.string().min(1),
		negationPrefix: z.string().min(1).default("no "),
		/**
		 * Set-style platforms (e.g. "set ") swap this prefix for the negation prefix.
		 */
		declarationPrefix: z.string().min(1).optional(),
		indentation: z.number().int().positive().default(2),
		rules: z.array(ruleDefinitionSchema).default([]),
		tags: z.array(tagRuleSchema).default([]),
		/**
		 * Applied to each line before indentation is measured.
		 */
		perLineSub: z.array(substitutionSchema).default([]),
		/**
		 * Applied to the whole text before it is split into lines.
		 */
		fullTextSub: z.array(substitutionSchema).default([]),
	})
	.strict()

export type DriverDefinition = z.infer<typeof driverDefinitionSchema>

export type DriverDefinitionInput = z.input<typeof driverDefinitionSchema>

export const DEFAULT_DRIVER_DEFINITION: DriverDefinition = {
	version: driverDefinitionVersion,
	platform: "generic",
	negationPrefix: "no ",
	indentation: 2,
	rules: [],
	tags: [],
	perLineSub: [],
	fullTextSub: [],
}

export type CreateDriverDefinitionParams = Omit<DriverDefinitionInput, "version" | "platform"> & {
	platform?: string
}

export function createDriverDefinition(params: CreateDriverDefinitionParams = {}): DriverDefinition {
	return driverDefinitionSchema.parse({
		...params,
		version: driverDefinitionVersion,
		platform: params.platform ?? DEFAULT_DRIVER_DEFINITION.platform,
	})
}
