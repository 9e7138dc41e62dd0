/**
 * RuleSet - Compiled, immutable vendor rules and options
 *
 * Responsibilities:
 * - Validate a driver definition once (zod) and compile its patterns
 * - Resolve the first rule of a kind matching a node's ancestor path
 * - Expose vendor options (negation prefix, indentation, substitutions)
 *
 * Nothing downstream re-validates: the Differ and FutureProjector only ever
 * see a RuleSet that compiled successfully.
 */

import {
	DEFAULT_DRIVER_DEFINITION,
	driverDefinitionSchema,
	type DriverDefinition,
	type DriverDefinitionInput,
	type LineageDefinition,
	type RuleDefinition,
	type RuleKind,
	type SubstitutionDefinition,
} from "@hiertree/types"

import { DriverLoadError, formatZodIssues, InvalidRulePatternError } from "../errors"
import { ConfigNode } from "../tree/ConfigNode"

import { compileMatcher, compileRegExp, lineageMatches, type CompiledMatcher } from "./matcher"

type Compiled<D> = D extends RuleDefinition
	? Omit<D, "match"> & {
			readonly match: readonly CompiledMatcher[]
			/** Position in the definition, for diagnostics */
			readonly index: number
		}
	: never

export type Rule = Compiled<RuleDefinition>

export type RuleOfKind<K extends RuleKind> = Extract<Rule, { kind: K }>

export interface TagRule {
	readonly match: readonly CompiledMatcher[]
	readonly apply: readonly string[]
}

export interface Substitution {
	readonly search: RegExp
	readonly replace: string
}

/** Something a rule can be resolved against: a node or its ancestor path */
export type RuleTarget = ConfigNode | readonly string[]

export type RuleSetResult =
	| { success: true; ruleSet: RuleSet }
	| { success: false; error: InvalidRulePatternError | DriverLoadError }

function isKind<K extends RuleKind>(rule: Rule, kind: K): rule is RuleOfKind<K> {
	return rule.kind === kind
}

function compileLineage(lineage: LineageDefinition, location: string): readonly CompiledMatcher[] {
	return Object.freeze(lineage.map((matcher, depth) => compileMatcher(matcher, `${location}.match[${depth}]`)))
}

function compileSubstitutions(
	substitutions: readonly SubstitutionDefinition[],
	location: string,
	flags: string,
): readonly Substitution[] {
	return Object.freeze(
		substitutions.map((sub, i) =>
			Object.freeze({ search: compileRegExp(sub.search, `${location}[${i}]`, flags), replace: sub.replace }),
		),
	)
}

export class RuleSet {
	readonly platform: string
	readonly negationPrefix: string
	readonly declarationPrefix?: string
	readonly indentation: number
	readonly rules: readonly Rule[]
	readonly tagRules: readonly TagRule[]
	readonly perLineSub: readonly Substitution[]
	readonly fullTextSub: readonly Substitution[]

	private readonly byKind = new Map<RuleKind, Rule[]>()

	private constructor(definition: DriverDefinition) {
		this.platform = definition.platform
		this.negationPrefix = definition.negationPrefix
		this.declarationPrefix = definition.declarationPrefix
		this.indentation = definition.indentation

		this.rules = Object.freeze(
			definition.rules.map((rule, index): Rule => {
				const match = compileLineage(rule.match, `rules[${index}]`)
				return Object.freeze({ ...rule, match, index })
			}),
		)
		this.tagRules = Object.freeze(
			definition.tags.map((rule, index) =>
				Object.freeze({
					match: compileLineage(rule.match, `tags[${index}]`),
					apply: Object.freeze([...rule.apply]),
				}),
			),
		)
		this.perLineSub = compileSubstitutions(definition.perLineSub, "perLineSub", "g")
		this.fullTextSub = compileSubstitutions(definition.fullTextSub, "fullTextSub", "gm")

		for (const rule of this.rules) {
			const bucket = this.byKind.get(rule.kind) ?? []
			bucket.push(rule)
			this.byKind.set(rule.kind, bucket)
		}
	}

	/** Validate and compile; failures are returned, never thrown */
	static create(input: DriverDefinitionInput): RuleSetResult {
		const parsed = driverDefinitionSchema.safeParse(input)
		if (!parsed.success) {
			return {
				success: false,
				error: new DriverLoadError(
					input.platform || "<inline>",
					formatZodIssues(parsed.error.issues),
					parsed.error.issues,
				),
			}
		}

		try {
			return { success: true, ruleSet: new RuleSet(parsed.data) }
		} catch (error) {
			if (error instanceof InvalidRulePatternError) {
				return { success: false, error }
			}
			throw error
		}
	}

	/** Like `create`, but throws the failure */
	static fromDefinition(input: DriverDefinitionInput): RuleSet {
		const result = RuleSet.create(input)
		if (!result.success) {
			throw result.error
		}
		return result.ruleSet
	}

	/** No rules, "no " negation, two-space indentation */
	static empty(): RuleSet {
		return new RuleSet(DEFAULT_DRIVER_DEFINITION)
	}

	/** First rule of the kind, in declaration order, matching the target's ancestor path */
	resolve<K extends RuleKind>(target: RuleTarget, kind: K): RuleOfKind<K> | undefined {
		const path = target instanceof ConfigNode ? target.path() : target
		for (const rule of this.byKind.get(kind) ?? []) {
			if (isKind(rule, kind) && lineageMatches(rule.match, path)) {
				return rule
			}
		}
		return undefined
	}

	matches(rule: Rule | TagRule, target: RuleTarget): boolean {
		const path = target instanceof ConfigNode ? target.path() : target
		return lineageMatches(rule.match, path)
	}

	/** The idempotent rule covering the target, unless an idempotent_avoid rule excludes it */
	idempotentRuleFor(target: RuleTarget): RuleOfKind<"idempotent"> | undefined {
		if (this.resolve(target, "idempotent_avoid")) {
			return undefined
		}
		return this.resolve(target, "idempotent")
	}

	/** Repeated sibling texts are kept as separate lines under this parent path */
	allowsDuplicateChild(parentPath: readonly string[]): boolean {
		if (parentPath.length === 0) {
			return false
		}
		return this.resolve(parentPath, "duplicate_child_allowed") !== undefined
	}

	orderWeightFor(target: RuleTarget): number | undefined {
		return this.resolve(target, "ordering")?.weight
	}

	/** Exit marker for a section; a rule with a null exit text suppresses it */
	sectionExitFor(target: RuleTarget): string | undefined {
		return this.resolve(target, "sectional_exiting")?.exitText ?? undefined
	}
}
