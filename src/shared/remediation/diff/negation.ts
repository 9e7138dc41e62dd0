import type { ConfigNode } from "../tree/ConfigNode"
import type { RuleSet } from "../rules/RuleSet"

export type NegationSource = "negate_with" | "negation_default_when" | "default_negation"

export interface Negation {
	text: string
	source: NegationSource
}

/**
 * Swap a line between its configured and negated forms.
 *
 * "no foo" -> "foo", "foo" -> "no foo"; on set-style platforms
 * "set foo" -> "delete foo" and "delete foo" -> "set foo".
 */
export function swapNegation(text: string, negationPrefix: string, declarationPrefix?: string): string {
	if (text.startsWith(negationPrefix)) {
		const stripped = text.slice(negationPrefix.length)
		return declarationPrefix ? `${declarationPrefix}${stripped}` : stripped
	}
	if (declarationPrefix && text.startsWith(declarationPrefix)) {
		return `${negationPrefix}${text.slice(declarationPrefix.length)}`
	}
	return `${negationPrefix}${text}`
}

/**
 * Text that removes the node from a device, or undefined when a no_negation
 * rule says the line is never negated.
 */
export function negationFor(node: ConfigNode, rules: RuleSet): Negation | undefined {
	const negateWith = rules.resolve(node, "negate_with")
	if (negateWith) {
		return { text: negateWith.use, source: "negate_with" }
	}

	if (rules.resolve(node, "no_negation")) {
		return undefined
	}

	if (rules.resolve(node, "negation_default_when")) {
		const { negationPrefix } = rules
		const base = node.text.startsWith(negationPrefix) ? node.text.slice(negationPrefix.length) : node.text
		return { text: `default ${base}`, source: "negation_default_when" }
	}

	const prefix = rules.resolve(node, "default_negation")?.prefix ?? rules.negationPrefix
	return {
		text: swapNegation(node.text, prefix, rules.declarationPrefix),
		source: "default_negation",
	}
}
