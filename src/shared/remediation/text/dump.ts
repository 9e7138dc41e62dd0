import { treeDumpSchema, treeDumpVersion, type DumpLine, type TreeDump } from "@hiertree/types"

import { RemediationTree } from "../diff/RemediationTree"
import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"
import { ConfigTree } from "../tree/ConfigTree"

import { orderedChildren } from "./render"

function dumpLine(node: ConfigNode): DumpLine {
	const line: DumpLine = {
		depth: node.depth,
		text: node.text,
		tags: [...node.tags].sort(),
		comments: [...node.comments].sort(),
	}
	if (node.orderWeight !== undefined) line.orderWeight = node.orderWeight
	if (node.operation) line.operation = node.operation
	if (node.sectionExit) line.sectionExit = node.sectionExit
	if (node.replaces !== undefined) line.replaces = node.replaces
	return line
}

function* dumpLines(container: ConfigContainer): Generator<DumpLine> {
	for (const child of orderedChildren(container)) {
		yield dumpLine(child)
		yield* dumpLines(child)
	}
}

/** Flat preorder form of a tree, in emission order */
export function dumpTree(tree: ConfigTree, platform: string): TreeDump {
	const dump: TreeDump = {
		version: treeDumpVersion,
		platform,
		lines: [...dumpLines(tree)],
	}
	if (tree instanceof RemediationTree && tree.diagnostics.length > 0) {
		dump.diagnostics = tree.diagnostics.map((d) => ({ ...d }))
	}
	return dump
}

/**
 * Rebuild a tree from a dump. Dumps carrying operations come back as
 * remediation trees; repeated sibling texts are kept as separate lines.
 */
export function treeFromDump(input: unknown): ConfigTree {
	const dump = treeDumpSchema.parse(input)
	const built = ConfigTree.fromEntries(dump.lines, { allowDuplicate: () => true })

	let position = 0
	for (const node of built.allNodes()) {
		const line = dump.lines[position++]
		for (const tag of line.tags) node.tags.add(tag)
		for (const comment of line.comments) node.comments.add(comment)
		node.orderWeight = line.orderWeight
		node.operation = line.operation
		node.sectionExit = line.sectionExit
		node.replaces = line.replaces
	}

	if (!dump.lines.some((line) => line.operation !== undefined)) {
		return built
	}

	const remediation = new RemediationTree().merge(built)
	remediation.diagnostics.push(...(dump.diagnostics ?? []))
	return remediation
}
