/**
 * Tagger - Label lines by ancestor-path rules and cut trees down to a tag
 *
 * Both operations return new trees; the input is left as it was.
 */

import type { RemediationTree } from "../diff/RemediationTree"
import { lineageMatches } from "../rules/matcher"
import { RuleSet, type TagRule } from "../rules/RuleSet"
import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"
import type { ConfigTree } from "../tree/ConfigTree"

export type TagSource = RuleSet | readonly TagRule[]

export interface TagFilter {
	/** Keep lines carrying any of these; when empty every line qualifies */
	include?: readonly string[]
	/** Drop lines carrying any of these */
	exclude?: readonly string[]
}

function tagRulesOf(source: TagSource): readonly TagRule[] {
	return source instanceof RuleSet ? source.tagRules : source
}

function tagSubtree(node: ConfigNode, tags: readonly string[]): void {
	for (const tag of tags) node.tags.add(tag)
	for (const descendant of node.allNodes()) {
		for (const tag of tags) descendant.tags.add(tag)
	}
}

/**
 * Include/exclude test for a single line: with include tags the line needs
 * one of them, and any exclude tag then rules it out.
 */
export function lineIncluded(tags: ReadonlySet<string>, filter: TagFilter): boolean {
	const include = filter.include ?? []
	const exclude = filter.exclude ?? []

	const included = include.length > 0 && include.some((tag) => tags.has(tag))
	if (exclude.length > 0 && (included || include.length === 0)) {
		return !exclude.some((tag) => tags.has(tag))
	}
	return included
}

function copyWhere(
	source: ConfigContainer,
	destination: ConfigContainer,
	keep: (node: ConfigNode) => boolean,
): void {
	for (const child of source.children) {
		if (!keep(child)) {
			continue
		}
		const copy = destination.addShallowCopyOf(child, {
			annotations: true,
			allowDuplicate: destination.has(child.text),
		})
		copyWhere(child, copy, keep)
	}
}

export function applyTags(tree: RemediationTree, source: TagSource): RemediationTree
export function applyTags(tree: ConfigTree, source: TagSource): ConfigTree
export function applyTags(tree: ConfigTree, source: TagSource): ConfigTree {
	const copy = tree.deepCopy()
	const rules = tagRulesOf(source)

	for (const node of copy.allNodes()) {
		const path = node.path()
		for (const rule of rules) {
			if (lineageMatches(rule.match, path)) {
				tagSubtree(node, rule.apply)
			}
		}
	}
	return copy
}

/** Lines carrying the tag themselves or below them, with their ancestors, in order */
export function filterByTag(tree: RemediationTree, tag: string): RemediationTree
export function filterByTag(tree: ConfigTree, tag: string): ConfigTree
export function filterByTag(tree: ConfigTree, tag: string): ConfigTree {
	const result = tree.cloneEmpty()
	copyWhere(tree, result, (node) => node.effectiveTags.has(tag))
	return result
}

/** Leaves passing the include/exclude test, with their ancestors, in order */
export function filterByTags(tree: RemediationTree, filter: TagFilter): RemediationTree
export function filterByTags(tree: ConfigTree, filter: TagFilter): ConfigTree
export function filterByTags(tree: ConfigTree, filter: TagFilter): ConfigTree {
	const keep = (node: ConfigNode): boolean =>
		node.isLeaf ? lineIncluded(node.tags, filter) : node.children.some((child) => keep(child))

	const result = tree.cloneEmpty()
	copyWhere(tree, result, keep)
	return result
}

export class Tagger {
	constructor(private readonly source: TagSource) {}

	apply(tree: RemediationTree): RemediationTree
	apply(tree: ConfigTree): ConfigTree
	apply(tree: ConfigTree): ConfigTree {
		return applyTags(tree, this.source)
	}
}
