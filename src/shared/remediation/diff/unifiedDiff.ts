import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"

function byWeight(nodes: readonly ConfigNode[]): ConfigNode[] {
	return [...nodes].sort((a, b) => (a.orderWeight ?? 0) - (b.orderWeight ?? 0))
}

function* sortedDescendants(node: ConfigNode): Generator<ConfigNode> {
	for (const child of byWeight(node.children)) {
		yield child
		yield* sortedDescendants(child)
	}
}

/**
 * Tree-level unified diff: lines only in `config` are prefixed "- ", lines only
 * in `target` "+ ", and shared parents are printed once to give context.
 *
 * Sibling order is not compared and repeated sibling texts are treated as one
 * line.
 */
export function* unifiedDiff(config: ConfigContainer, target: ConfigContainer, indentation = 2): Generator<string> {
	const indent = (node: ConfigNode) => " ".repeat(indentation * (node.depth - 1))

	for (const child of config.children) {
		const targetChild = target.getChild(child.text)
		if (targetChild) {
			const nested = [...unifiedDiff(child, targetChild, indentation)]
			if (nested.length > 0) {
				yield `${indent(child)}${child.text}`
				yield* nested
			}
			continue
		}

		yield `${indent(child)}- ${child.text}`
		for (const descendant of sortedDescendants(child)) {
			yield `${indent(descendant)}- ${descendant.text}`
		}
	}

	for (const child of target.children) {
		if (config.has(child.text)) {
			continue
		}

		yield `${indent(child)}+ ${child.text}`
		for (const descendant of sortedDescendants(child)) {
			yield `${indent(descendant)}+ ${descendant.text}`
		}
	}
}
