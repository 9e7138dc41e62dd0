/**
 * Differ - Compute the remediation that turns a running config into a target
 *
 * Responsibilities:
 * - Negate running lines absent from the target (left pass)
 * - Add target lines absent from running, whole subtree at once (right pass)
 * - Recurse through lines present in both, keeping them only as context
 * - Skip removals covered by idempotent replacement
 * - Replace whole sections matched by sectional_overwrite rules
 * - Order siblings by ordering-rule weight and set sectional exit markers
 *
 * The walk never fails on a validated RuleSet; ambiguous idempotent slots are
 * reported as diagnostics on the returned tree.
 */

import type { RemediationDiagnostic } from "@hiertree/types"

import { RuleSet, type RuleOfKind } from "../rules/RuleSet"
import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"
import type { ConfigTree } from "../tree/ConfigTree"

import { negationFor } from "./negation"
import { RemediationTree } from "./RemediationTree"

/** Target line text -> running line text it replaces in place, for one level */
type Replacements = Map<string, string>

export class Differ {
	constructor(private readonly rules: RuleSet = RuleSet.empty()) {}

	compare(running: ConfigTree, target: ConfigTree): RemediationTree {
		const remediation = new RemediationTree()
		this.compareLevel(running, target, remediation, remediation.diagnostics)
		this.finalize(remediation)
		return remediation
	}

	private compareLevel(
		running: ConfigContainer,
		target: ConfigContainer,
		delta: ConfigContainer,
		diagnostics: RemediationDiagnostic[],
	): void {
		const replacements = this.compareLeft(running, target, delta, diagnostics)
		this.compareRight(running, target, delta, diagnostics, replacements)
	}

	private compareLeft(
		running: ConfigContainer,
		target: ConfigContainer,
		delta: ConfigContainer,
		diagnostics: RemediationDiagnostic[],
	): Replacements {
		const replacements: Replacements = new Map()

		for (const runningChild of running.children) {
			if (target.has(runningChild.text)) {
				continue
			}
			const replacement = this.idempotentSlot(runningChild, running, target, diagnostics)
			if (replacement) {
				replacements.set(replacement.text, runningChild.text)
				continue
			}

			const removed = this.addRemoval(delta, runningChild)
			if (removed && runningChild.hasChildren) {
				removed.comments.add(`removes ${runningChild.children.length + 1} lines`)
			}
		}
		return replacements
	}

	private compareRight(
		running: ConfigContainer,
		target: ConfigContainer,
		delta: ConfigContainer,
		diagnostics: RemediationDiagnostic[],
		replacements: Replacements,
	): void {
		for (const targetChild of target.children) {
			const runningChild = running.getChild(targetChild.text)

			if (!runningChild) {
				const existing = delta.getChild(targetChild.text)
				// A removal already emitted with this exact text stays in place
				if (existing?.operation === "remove") {
					continue
				}
				const added = this.addSubtree(delta, targetChild)
				if (targetChild.hasChildren) {
					added.comments.add("new section")
				}
				added.replaces = replacements.get(targetChild.text)
				if (added.replaces === undefined) {
					this.checkAddedSlot(targetChild, running, target, diagnostics)
				}
				continue
			}

			const context = delta.addChild(targetChild.text, { allowDuplicate: delta.has(targetChild.text) })
			this.compareLevel(runningChild, targetChild, context, diagnostics)

			if (!context.hasChildren) {
				context.delete()
				continue
			}

			const overwrite = this.rules.resolve(runningChild, "sectional_overwrite")
			if (!overwrite && !this.rules.resolve(runningChild, "sectional_overwrite_no_negate")) {
				continue
			}

			// Nothing to negate or re-create: the nested changes stand
			if (!overwrite && !targetChild.hasChildren) {
				continue
			}

			context.delete()
			if (overwrite) {
				this.addRemoval(delta, runningChild)?.comments.add("dropping section")
			}
			this.addSubtree(delta, targetChild).comments.add("re-create section")
		}
	}

	/**
	 * The target line that replaces a running line (absent from the target) in
	 * place: the only target line of the same idempotent class, provided the
	 * running line is the only one of that class too.
	 */
	private idempotentSlot(
		runningChild: ConfigNode,
		running: ConfigContainer,
		target: ConfigContainer,
		diagnostics: RemediationDiagnostic[],
	): ConfigNode | undefined {
		const rule = this.rules.idempotentRuleFor(runningChild)
		if (!rule) {
			return undefined
		}

		const targetMatches = target.children.filter((child) => this.rules.matches(rule, child))
		if (targetMatches.length === 0) {
			return undefined
		}

		const runningMatches = running.children.filter((child) => this.rules.matches(rule, child))
		if (targetMatches.length === 1 && runningMatches.length === 1) {
			return targetMatches[0]
		}

		recordAmbiguity(diagnostics, running, rule, runningMatches, targetMatches, "removals were emitted")
		return undefined
	}

	/**
	 * An added line of an idempotent class that replaces nothing, while running
	 * already holds a line of that class and the target holds several.
	 */
	private checkAddedSlot(
		targetChild: ConfigNode,
		running: ConfigContainer,
		target: ConfigContainer,
		diagnostics: RemediationDiagnostic[],
	): void {
		const rule = this.rules.idempotentRuleFor(targetChild)
		if (!rule) {
			return
		}

		const targetMatches = target.children.filter((child) => this.rules.matches(rule, child))
		const runningMatches = running.children.filter((child) => this.rules.matches(rule, child))
		if (targetMatches.length > 1 && runningMatches.length > 0) {
			recordAmbiguity(diagnostics, running, rule, runningMatches, targetMatches, "lines were added")
		}
	}

	private addRemoval(delta: ConfigContainer, runningChild: ConfigNode): ConfigNode | undefined {
		const negation = negationFor(runningChild, this.rules)
		if (!negation) {
			return undefined
		}

		const removed = delta.addChild(negation.text)
		removed.operation = "remove"
		removed.origin = runningChild

		// negate_with takes precedence: its literal already closes the section
		if (runningChild.hasChildren && negation.source !== "negate_with") {
			removed.sectionExit = this.rules.sectionExitFor(runningChild)
		}
		return removed
	}

	private addSubtree(delta: ConfigContainer, source: ConfigNode): ConfigNode {
		return addMarkedCopy(delta, source, false)
	}

	/** Apply ordering weights and sectional exits over the finished tree */
	private finalize(container: ConfigContainer): void {
		for (const child of container.children) {
			const weight = this.rules.orderWeightFor(child)
			if (weight !== undefined) {
				child.orderWeight = weight
			}
			if (child.hasChildren) {
				child.sectionExit = this.rules.sectionExitFor(child)
			}
			this.finalize(child)
		}
		container.sortChildren((a, b) => (a.orderWeight ?? 0) - (b.orderWeight ?? 0))
	}
}

export function compare(running: ConfigTree, target: ConfigTree, rules: RuleSet = RuleSet.empty()): RemediationTree {
	return new Differ(rules).compare(running, target)
}

/** Deep copy with every line marked as an addition pointing back at its target line */
function addMarkedCopy(parent: ConfigContainer, source: ConfigNode, allowDuplicate: boolean): ConfigNode {
	const copy = parent.addShallowCopyOf(source, { allowDuplicate })
	copy.operation = "add"
	copy.origin = source

	const seen = new Set<string>()
	for (const child of source.children) {
		addMarkedCopy(copy, child, seen.has(child.text))
		seen.add(child.text)
	}
	return copy
}

function recordAmbiguity(
	diagnostics: RemediationDiagnostic[],
	running: ConfigContainer,
	rule: RuleOfKind<"idempotent">,
	runningMatches: readonly ConfigNode[],
	targetMatches: readonly ConfigNode[],
	outcome: string,
): void {
	const path = running.path()
	const location = path.join(" / ") || "<root>"
	const runningTexts = runningMatches.map((node) => node.text)
	const duplicate = diagnostics.some(
		(d) => d.path.join("\n") === path.join("\n") && d.runningMatches.join("\n") === runningTexts.join("\n"),
	)
	if (duplicate) {
		return
	}

	diagnostics.push({
		kind: "AmbiguousIdempotentMatch",
		path,
		runningMatches: runningTexts,
		targetMatches: targetMatches.map((node) => node.text),
		message:
			`Idempotent rule #${rule.index} matches ${runningMatches.length} running and ${targetMatches.length} ` +
			`target lines under '${location}'; ${outcome} instead of replacing in place.`,
	})
}
