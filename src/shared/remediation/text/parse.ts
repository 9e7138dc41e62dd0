import { InvalidRangeError } from "../errors"
import { RuleSet, type Substitution } from "../rules/RuleSet"
import { ConfigTree, type ConfigEntry } from "../tree/ConfigTree"

function substitute(text: string, substitutions: readonly Substitution[]): string {
	return substitutions.reduce((current, sub) => current.replace(sub.search, sub.replace), text)
}

/**
 * Depth-annotated entries for indented config lines.
 *
 * Blank lines and `!` comment lines are dropped. A line indented deeper than
 * the previous one is its child; a shallower line closes every open level
 * indented at least as deep.
 */
export function* tokenizeLines(lines: Iterable<string>, rules: RuleSet = RuleSet.empty()): Generator<ConfigEntry> {
	const indents: number[] = []

	for (const raw of lines) {
		const line = substitute(raw, rules.perLineSub).replace(/\s+$/, "")
		const text = line.trim()
		if (!text || text.startsWith("!")) {
			continue
		}

		const indent = line.length - line.trimStart().length
		while (indents.length > 0 && indents[indents.length - 1] >= indent) {
			indents.pop()
		}
		indents.push(indent)

		yield { depth: indents.length, text }
	}
}

export function parseLines(lines: Iterable<string>, rules: RuleSet = RuleSet.empty()): ConfigTree {
	return ConfigTree.fromEntries(tokenizeLines(lines, rules), {
		allowDuplicate: (parentPath) => rules.allowsDuplicateChild(parentPath),
	})
}

export function parseConfig(text: string, rules: RuleSet = RuleSet.empty()): ConfigTree {
	return parseLines(substitute(text, rules.fullTextSub).split(/\r?\n/), rules)
}

/**
 * Flatten brace-style (Junos-like) configuration into `set` commands.
 * Nesting is read from four-space indentation; lines that already start
 * with `set` or `delete` pass through.
 */
export function convertToSetCommands(text: string): string {
	const path: string[] = []
	const commands: string[] = []

	for (const line of text.split(/\r?\n/)) {
		let stripped = line.trim()
		if (!stripped) {
			continue
		}
		if (stripped.endsWith(";")) {
			stripped = stripped.slice(0, -1).trimEnd()
		}

		const level = Math.floor((line.length - line.trimStart().length) / 4)
		path.splice(level)

		if (stripped.endsWith("{")) {
			path.push(stripped.slice(0, -1).trim())
		} else if (stripped.endsWith("}")) {
			continue
		} else if (stripped.startsWith("set ") || stripped.startsWith("delete ")) {
			commands.push(stripped)
		} else {
			commands.push(["set", ...path, stripped].join(" "))
		}
	}

	return commands.join("\n")
}

/**
 * Expand a port or VLAN list such as `2-5,8,22-24` into its numbers, in the
 * order listed. Every number may appear only once.
 */
export function expandRange(range: string): number[] {
	const numbers: number[] = []

	for (const part of range.split(",")) {
		const bounds = part.trim().split("-")
		if (bounds.length > 2 || bounds.some((bound) => !/^\d+$/.test(bound))) {
			throw new InvalidRangeError(range, `'${part}' is not a number or a start-stop pair`)
		}

		const start = Number(bounds[0])
		const stop = Number(bounds[bounds.length - 1])
		if (stop < start) {
			throw new InvalidRangeError(range, `'${part}' ends before it starts`)
		}
		for (let n = start; n <= stop; n++) {
			numbers.push(n)
		}
	}

	if (new Set(numbers).size !== numbers.length) {
		throw new InvalidRangeError(range, "a number is listed more than once")
	}
	return numbers
}
