import { z } from "zod"

/**
 * Flat, JSON-friendly form of a configuration tree.
 *
 * Lines are listed in preorder; `depth` starts at 1 for top-level lines.
 */

export const treeDumpVersion = 1 as const

export const remediationOperationSchema = z.enum(["add", "remove"])

export type RemediationOperation = z.infer<typeof remediationOperationSchema>

export const dumpLineSchema = z
	.object({
		depth: z.number().int().positive(),
		text: z.string().min(1),
		tags: z.array(z.string()).default([]),
		comments: z.array(z.string()).default([]),
		orderWeight: z.number().int().optional(),
		operation: remediationOperationSchema.optional(),
		sectionExit: z.string().optional(),
		/** Running line an idempotent add replaces in place */
		replaces: z.string().optional(),
	})
	.strict()

export type DumpLine = z.infer<typeof dumpLineSchema>

export const diagnosticSchema = z
	.object({
		kind: z.literal("AmbiguousIdempotentMatch"),
		path: z.array(z.string()),
		runningMatches: z.array(z.string()),
		targetMatches: z.array(z.string()),
		message: z.string(),
	})
	.strict()

export type AmbiguousIdempotentMatch = z.infer<typeof diagnosticSchema>

export type RemediationDiagnostic = AmbiguousIdempotentMatch

export const treeDumpSchema = z
	.object({
		version: z.literal(treeDumpVersion),
		platform: z.string(),
		lines: z.array(dumpLineSchema),
		diagnostics: z.array(diagnosticSchema).optional(),
	})
	.strict()

export type TreeDump = z.infer<typeof treeDumpSchema>
