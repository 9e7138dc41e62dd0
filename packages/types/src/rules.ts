import { z } from "zod"

import { lineageSchema } from "./matchRule"

export const ruleKinds = [
	"default_negation",
	"negate_with",
	"idempotent",
	"idempotent_avoid",
	"sectional_exiting",
	"sectional_overwrite",
	"sectional_overwrite_no_negate",
	"ordering",
	"no_negation",
	"negation_default_when",
	"duplicate_child_allowed",
] as const

export const ruleKindSchema = z.enum(ruleKinds)

export type RuleKind = z.infer<typeof ruleKindSchema>

export const defaultNegationRuleSchema = z
	.object({
		kind: z.literal("default_negation"),
		match: lineageSchema,
		/**
		 * Token prepended to the line, e.g. "no " or "delete ".
		 */
		prefix: z.string().min(1),
	})
	.strict()

export const negateWithRuleSchema = z
	.object({
		kind: z.literal("negate_with"),
		match: lineageSchema,
		/**
		 * Literal command emitted instead of a prefixed negation.
		 */
		use: z.string().min(1),
	})
	.strict()

export const idempotentRuleSchema = z
	.object({
		kind: z.literal("idempotent"),
		match: lineageSchema,
	})
	.strict()

export const idempotentAvoidRuleSchema = z
	.object({
		kind: z.literal("idempotent_avoid"),
		match: lineageSchema,
	})
	.strict()

export const sectionalExitingRuleSchema = z
	.object({
		kind: z.literal("sectional_exiting"),
		match: lineageSchema,
		/**
		 * null suppresses the exit marker for matching sections.
		 */
		exitText: z.string().min(1).nullable(),
	})
	.strict()

export const sectionalOverwriteRuleSchema = z
	.object({
		kind: z.literal("sectional_overwrite"),
		match: lineageSchema,
	})
	.strict()

export const sectionalOverwriteNoNegateRuleSchema = z
	.object({
		kind: z.literal("sectional_overwrite_no_negate"),
		match: lineageSchema,
	})
	.strict()

export const orderingRuleSchema = z
	.object({
		kind: z.literal("ordering"),
		match: lineageSchema,
		/**
		 * Lower weights are emitted first. Lines without a weight sort as 0.
		 */
		weight: z.number().int(),
	})
	.strict()

export const noNegationRuleSchema = z
	.object({
		kind: z.literal("no_negation"),
		match: lineageSchema,
	})
	.strict()

export const negationDefaultWhenRuleSchema = z
	.object({
		kind: z.literal("negation_default_when"),
		match: lineageSchema,
	})
	.strict()

export const duplicateChildAllowedRuleSchema = z
	.object({
		kind: z.literal("duplicate_child_allowed"),
		match: lineageSchema,
	})
	.strict()

export const ruleDefinitionSchema = z.discriminatedUnion("kind", [
	defaultNegationRuleSchema,
	negateWithRuleSchema,
	idempotentRuleSchema,
	idempotentAvoidRuleSchema,
	sectionalExitingRuleSchema,
	sectionalOverwriteRuleSchema,
	sectionalOverwriteNoNegateRuleSchema,
	orderingRuleSchema,
	noNegationRuleSchema,
	negationDefaultWhenRuleSchema,
	duplicateChildAllowedRuleSchema,
])

export type RuleDefinition = z.infer<typeof ruleDefinitionSchema>

export type RuleDefinitionOfKind<K extends RuleKind> = Extract<RuleDefinition, { kind: K }>

export const tagRuleSchema = z
	.object({
		match: lineageSchema,
		apply: z.array(z.string().min(1)).min(1),
	})
	.strict()

export type TagRuleDefinition = z.infer<typeof tagRuleSchema>
