import type { MatchRuleDefinition } from "@hiertree/types"

import { InvalidRulePatternError } from "../errors"

/** A per-depth matcher with list values normalized and its pattern compiled */
export interface CompiledMatcher {
	readonly equals?: readonly string[]
	readonly startsWith?: readonly string[]
	readonly endsWith?: readonly string[]
	readonly contains?: readonly string[]
	readonly reSearch?: RegExp
}

function toList(value: string | string[] | undefined): readonly string[] | undefined {
	if (value === undefined) return undefined
	return Object.freeze(typeof value === "string" ? [value] : [...value])
}

export function compileRegExp(pattern: string, location: string, flags = ""): RegExp {
	try {
		return new RegExp(pattern, flags)
	} catch (error) {
		throw new InvalidRulePatternError(pattern, location, { cause: error })
	}
}

export function compileMatcher(definition: MatchRuleDefinition, location: string): CompiledMatcher {
	return Object.freeze({
		equals: toList(definition.equals),
		startsWith: toList(definition.startsWith),
		endsWith: toList(definition.endsWith),
		contains: toList(definition.contains),
		reSearch: definition.reSearch === undefined ? undefined : compileRegExp(definition.reSearch, location),
	})
}

export function textMatches(matcher: CompiledMatcher, text: string): boolean {
	if (matcher.equals && !matcher.equals.includes(text)) return false
	if (matcher.startsWith && !matcher.startsWith.some((prefix) => text.startsWith(prefix))) return false
	if (matcher.endsWith && !matcher.endsWith.some((suffix) => text.endsWith(suffix))) return false
	if (matcher.contains && !matcher.contains.some((part) => text.includes(part))) return false
	if (matcher.reSearch && !matcher.reSearch.test(text)) return false
	return true
}

/** One matcher per depth; the path must be exactly as deep as the lineage */
export function lineageMatches(matchers: readonly CompiledMatcher[], path: readonly string[]): boolean {
	if (matchers.length !== path.length) {
		return false
	}
	return matchers.every((matcher, i) => textMatches(matcher, path[i]))
}
