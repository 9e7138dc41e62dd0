/**
 * FutureProjector - Predict the config a device ends up with after a remediation
 *
 * Responsibilities:
 * - Apply additions, removals and in-place idempotent replacements per level
 * - Keep running lines the remediation does not touch, after the changed ones
 * - Derive rollbacks by diffing in the reverse direction
 * - Chain predictions for multi-step change plans
 *
 * Inputs are never mutated; every call returns a new tree.
 */

import { Differ } from "../diff/Differ"
import { swapNegation } from "../diff/negation"
import type { RemediationTree } from "../diff/RemediationTree"
import { RuleSet } from "../rules/RuleSet"
import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"
import { ConfigTree } from "../tree/ConfigTree"

export interface PlannedStep {
	/** Position of the target in the plan, starting at 0 */
	index: number
	remediation: RemediationTree
	/** Config expected after this step; the running config of the next one */
	predicted: ConfigTree
	/** Remediation that returns from `predicted` to this step's starting config */
	rollback: RemediationTree
}

export class FutureProjector {
	private readonly differ: Differ

	constructor(private readonly rules: RuleSet = RuleSet.empty()) {
		this.differ = new Differ(rules)
	}

	predict(running: ConfigTree, remediation: ConfigTree): ConfigTree {
		const future = new ConfigTree()
		this.projectLevel(running, remediation, future)
		return future
	}

	predictFromTarget(running: ConfigTree, target: ConfigTree): ConfigTree {
		return this.predict(running, this.differ.compare(running, target))
	}

	rollback(future: ConfigTree, running: ConfigTree): RemediationTree {
		return this.differ.compare(future, running)
	}

	planSteps(running: ConfigTree, targets: readonly ConfigTree[]): PlannedStep[] {
		let current = running
		return targets.map((target, index) => {
			const remediation = this.differ.compare(current, target)
			const predicted = this.predict(current, remediation)
			const rollback = this.differ.compare(predicted, current)
			current = predicted
			return { index, remediation, predicted, rollback }
		})
	}

	private projectLevel(running: ConfigContainer, changes: ConfigContainer, future: ConfigContainer): void {
		const consumed = new Set<ConfigNode>()
		const ignored = new Set<ConfigNode>()
		const allowDuplicate = this.rules.allowsDuplicateChild(future.path())
		const { negationPrefix, declarationPrefix } = this.rules

		// A running line whose negate_with text is among the changes is removed by it
		for (const runningChild of running.children) {
			const negateWith = this.rules.resolve(runningChild, "negate_with")
			if (!negateWith || negateWith.use === runningChild.text) {
				continue
			}
			const change = changes.getChild(negateWith.use)
			if (change) {
				consumed.add(runningChild)
				ignored.add(change)
			}
		}

		const take = (text: string): ConfigNode | undefined => {
			const node = running.getChild(text)
			if (!node || consumed.has(node)) {
				return undefined
			}
			consumed.add(node)
			return node
		}

		for (const change of changes.children) {
			if (ignored.has(change)) {
				continue
			}

			if (change.operation === "remove" && change.origin) {
				take(change.origin.text)
				continue
			}

			if (change.operation === "add" && this.overwritesSection(change)) {
				take(change.text)
				addPlainCopy(future, change, allowDuplicate)
				continue
			}

			const same = take(change.text)
			if (same) {
				const futureChild = future.addShallowCopyOf(same, { allowDuplicate })
				this.projectLevel(same, change, futureChild)
				continue
			}

			if (change.operation === "add" && change.replaces !== undefined) {
				take(change.replaces)
				addPlainCopy(future, change, allowDuplicate)
				continue
			}

			// Hand-written remediations carry no replacement; a single free slot is taken
			const idempotent = change.operation === undefined ? this.rules.idempotentRuleFor(change) : undefined
			if (idempotent) {
				const slots = running.children.filter(
					(child) => !consumed.has(child) && this.rules.matches(idempotent, child),
				)
				if (slots.length === 1) {
					consumed.add(slots[0])
					addPlainCopy(future, change, allowDuplicate)
					continue
				}
			}

			if (change.text.startsWith(negationPrefix)) {
				// A negation with nothing to negate stays on the device as written
				if (!take(swapNegation(change.text, negationPrefix, declarationPrefix))) {
					addPlainCopy(future, change, allowDuplicate)
				}
				continue
			}

			if (change.text.startsWith("default ") && take(change.text.slice("default ".length))) {
				continue
			}

			if (take(`${negationPrefix}${change.text}`)) {
				continue
			}

			addPlainCopy(future, change, allowDuplicate)
		}

		for (const runningChild of running.children) {
			if (!consumed.has(runningChild)) {
				future.addDeepCopyOf(runningChild, { allowDuplicate })
			}
		}
	}

	private overwritesSection(change: ConfigNode): boolean {
		return (
			this.rules.resolve(change, "sectional_overwrite") !== undefined ||
			this.rules.resolve(change, "sectional_overwrite_no_negate") !== undefined
		)
	}
}

/** Copy text and tags only; remediation comments, weights and operations stay behind */
function addPlainCopy(parent: ConfigContainer, source: ConfigNode, allowDuplicate: boolean): ConfigNode {
	const copy = parent.addChild(source.text, { allowDuplicate })
	for (const tag of source.tags) copy.tags.add(tag)

	const seen = new Set<string>()
	for (const child of source.children) {
		addPlainCopy(copy, child, seen.has(child.text))
		seen.add(child.text)
	}
	return copy
}

export function predict(running: ConfigTree, remediation: ConfigTree, rules: RuleSet = RuleSet.empty()): ConfigTree {
	return new FutureProjector(rules).predict(running, remediation)
}

export function predictFromTarget(
	running: ConfigTree,
	target: ConfigTree,
	rules: RuleSet = RuleSet.empty(),
): ConfigTree {
	return new FutureProjector(rules).predictFromTarget(running, target)
}

export function rollback(future: ConfigTree, running: ConfigTree, rules: RuleSet = RuleSet.empty()): RemediationTree {
	return new FutureProjector(rules).rollback(future, running)
}

export function planSteps(
	running: ConfigTree,
	targets: readonly ConfigTree[],
	rules: RuleSet = RuleSet.empty(),
): PlannedStep[] {
	return new FutureProjector(rules).planSteps(running, targets)
}
