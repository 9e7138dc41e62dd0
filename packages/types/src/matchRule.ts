import { z } from "zod"

const textOrTexts = z.union([z.string(), z.array(z.string()).min(1)])

/**
 * Matcher for a single depth of an ancestor path.
 *
 * Every field that is present must succeed. List values match when any entry
 * matches. A matcher with no fields matches any line.
 */
export const matchRuleSchema = z
	.object({
		equals: textOrTexts.optional(),
		startsWith: textOrTexts.optional(),
		endsWith: textOrTexts.optional(),
		contains: textOrTexts.optional(),
		/**
		 * Regular expression searched anywhere in the line (not anchored).
		 */
		reSearch: z.string().optional(),
	})
	.strict()

export type MatchRuleDefinition = z.infer<typeof matchRuleSchema>

/**
 * One matcher per depth, from the top-level line down to the matched line.
 */
export const lineageSchema = z.array(matchRuleSchema).min(1)

export type LineageDefinition = z.infer<typeof lineageSchema>
