import { MalformedHierarchyError } from "../errors"

import { ConfigContainer, type AddChildOptions, type ConfigNode } from "./ConfigNode"

/** A line with its depth (1 = top level), as produced by a tokenizer */
export interface ConfigEntry {
	depth: number
	text: string
}

export interface FromEntriesOptions {
	/** Decide whether a repeated text under the given parent path becomes a new sibling */
	allowDuplicate?: (parentPath: readonly string[]) => boolean
}

/**
 * ConfigTree - Virtual root owning the top-level lines of a configuration
 *
 * Responsibilities:
 * - Path-based insertion and lookup
 * - Building a tree from depth-annotated entries, rejecting depth jumps
 * - Independent deep copies and merges
 */
export class ConfigTree extends ConfigContainer {
	get depth(): number {
		return 0
	}

	path(): string[] {
		return []
	}

	/** Insert a path, creating missing ancestors; returns the deepest node */
	insert(path: readonly string[], options: AddChildOptions = {}): ConfigNode {
		if (path.length === 0) {
			throw new Error("Cannot insert an empty path.")
		}

		const [first, ...rest] = path
		let node = this.addChild(first, { allowDuplicate: rest.length === 0 && options.allowDuplicate })
		rest.forEach((text, i) => {
			node = node.addChild(text, { allowDuplicate: i === rest.length - 1 && options.allowDuplicate })
		})
		return node
	}

	find(path: readonly string[]): ConfigNode | undefined {
		let container: ConfigContainer = this
		let node: ConfigNode | undefined
		for (const text of path) {
			node = container.getChild(text)
			if (!node) {
				return undefined
			}
			container = node
		}
		return node
	}

	ancestorPath(node: ConfigNode): string[] {
		return node.path()
	}

	/** An empty tree of the same kind */
	cloneEmpty(): ConfigTree {
		return new ConfigTree()
	}

	deepCopy(): ConfigTree {
		const copy = this.cloneEmpty()
		copy.merge(this)
		return copy
	}

	/** Deep-copy the lines of the other trees into this one, merging equal paths */
	merge(...others: ConfigContainer[]): this {
		for (const other of others) {
			const repeated = new Map<string, number>()
			for (const child of other.children) {
				repeated.set(child.text, (repeated.get(child.text) ?? 0) + 1)
			}

			for (const child of other.children) {
				this.addDeepCopyOf(child, { annotations: true, allowDuplicate: (repeated.get(child.text) ?? 0) > 1 })
			}
		}
		return this
	}

	static fromEntries(entries: Iterable<ConfigEntry>, options: FromEntriesOptions = {}): ConfigTree {
		const tree = new ConfigTree()
		const stack: ConfigContainer[] = [tree]
		let index = 0

		for (const entry of entries) {
			const previousDepth = stack.length - 1
			if (!Number.isInteger(entry.depth) || entry.depth < 1 || entry.depth > stack.length) {
				throw new MalformedHierarchyError(index, entry.depth, previousDepth)
			}

			stack.length = entry.depth
			const parent = stack[entry.depth - 1]
			const allowDuplicate = options.allowDuplicate?.(parent.path()) ?? false
			stack.push(parent.addChild(entry.text, { allowDuplicate }))
			index++
		}

		return tree
	}
}
