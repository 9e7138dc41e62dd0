/**
 * ConfigNode - A single configuration line and the children it owns
 *
 * Responsibilities:
 * - Own child lines exclusively, in insertion order
 * - Keep sibling texts unique unless a caller asks for a duplicate
 * - Compute ancestor paths through a non-owning parent link
 * - Carry metadata (tags, comments, weights) that never affects equality
 * - Carry remediation annotations when the node belongs to a remediation tree
 *
 * ConfigContainer lives in this file as well: ConfigTree and ConfigNode both
 * extend it, and ConfigContainer constructs ConfigNode instances.
 */

import type { RemediationOperation } from "@hiertree/types"

export interface AddChildOptions {
	/** Create a new sibling even when one with the same text exists */
	allowDuplicate?: boolean
}

export interface CopyOptions extends AddChildOptions {
	/** Also copy operation, origin, section exit and replaced line */
	annotations?: boolean
}

export abstract class ConfigContainer {
	private readonly childList: ConfigNode[] = []
	private readonly index = new Map<string, ConfigNode>()

	/** 0 for the virtual root, 1 for top-level lines */
	abstract get depth(): number

	/** Texts from the top-level line down to this one */
	abstract path(): string[]

	get children(): readonly ConfigNode[] {
		return this.childList
	}

	get hasChildren(): boolean {
		return this.childList.length > 0
	}

	has(text: string): boolean {
		return this.index.has(text)
	}

	/** First child with exactly this text */
	getChild(text: string): ConfigNode | undefined {
		return this.index.get(text)
	}

	getChildren(predicate: (child: ConfigNode) => boolean): ConfigNode[] {
		return this.childList.filter(predicate)
	}

	/**
	 * Add a child line. Text is trimmed; an existing sibling with the same text
	 * is returned instead of a new node unless `allowDuplicate` is set.
	 */
	addChild(text: string, options: AddChildOptions = {}): ConfigNode {
		const normalized = text.trim()
		if (!normalized) {
			throw new Error(`Cannot add an empty line under '${this.path().join(" / ") || "<root>"}'.`)
		}

		const existing = this.index.get(normalized)
		if (existing && !options.allowDuplicate) {
			return existing
		}

		const node = new ConfigNode(normalized, this)
		this.childList.push(node)
		if (!existing) {
			this.index.set(normalized, node)
		}
		return node
	}

	/** Copy a single line (without its children) under this container */
	addShallowCopyOf(source: ConfigNode, options: CopyOptions = {}): ConfigNode {
		const copy = this.addChild(source.text, options)
		for (const tag of source.tags) copy.tags.add(tag)
		for (const comment of source.comments) copy.comments.add(comment)
		if (source.orderWeight !== undefined) copy.orderWeight = source.orderWeight

		if (options.annotations) {
			copy.operation = source.operation
			copy.origin = source.origin
			copy.sectionExit = source.sectionExit
			copy.replaces = source.replaces
		}
		return copy
	}

	/** Copy a line and its whole subtree under this container */
	addDeepCopyOf(source: ConfigNode, options: CopyOptions = {}): ConfigNode {
		const copy = this.addShallowCopyOf(source, options)
		const repeated = repeatedTexts(source.children)

		for (const child of source.children) {
			copy.addDeepCopyOf(child, { annotations: options.annotations, allowDuplicate: repeated.has(child.text) })
		}
		return copy
	}

	deleteChild(node: ConfigNode): boolean {
		const position = this.childList.indexOf(node)
		if (position === -1) {
			return false
		}

		this.childList.splice(position, 1)
		if (this.index.get(node.text) === node) {
			const next = this.childList.find((child) => child.text === node.text)
			if (next) {
				this.index.set(node.text, next)
			} else {
				this.index.delete(node.text)
			}
		}
		return true
	}

	deleteChildByText(text: string): boolean {
		const node = this.index.get(text)
		return node ? this.deleteChild(node) : false
	}

	/** Stable in-place sort of the direct children */
	sortChildren(compareFn: (a: ConfigNode, b: ConfigNode) => number): void {
		this.childList.sort(compareFn)
	}

	/** Preorder walk of every descendant; each call to the iterator restarts it */
	allNodes(): Iterable<ConfigNode> {
		return {
			[Symbol.iterator]: () => walk(this),
		}
	}

	get lineCount(): number {
		let count = 0
		for (const _node of this.allNodes()) count++
		return count
	}

	/**
	 * Structural equality: same texts at every level, independent of sibling
	 * order. Tags, comments, weights and annotations are ignored.
	 */
	equals(other: ConfigContainer): boolean {
		if (this.childList.length !== other.childList.length) {
			return false
		}

		const mine = sortedByText(this.childList)
		const theirs = sortedByText(other.childList)

		return mine.every((child, i) => child.text === theirs[i].text && child.equals(theirs[i]))
	}
}

export class ConfigNode extends ConfigContainer {
	readonly tags = new Set<string>()
	readonly comments = new Set<string>()

	/** Set by an ordering rule; unset sorts as 0 */
	orderWeight?: number

	/** Remediation tree only: what applying this line does */
	operation?: RemediationOperation

	/** Remediation tree only: the running or target line this one came from */
	origin?: ConfigNode

	/** Remediation tree only: marker emitted after this line's block */
	sectionExit?: string

	/** Remediation tree only: text of the running sibling this add replaces in place */
	replaces?: string

	constructor(
		readonly text: string,
		readonly parent: ConfigContainer,
	) {
		super()
	}

	get depth(): number {
		return this.parent.depth + 1
	}

	path(): string[] {
		return [...this.parent.path(), this.text]
	}

	/** This node and its ancestors, top-level line first */
	lineage(): ConfigNode[] {
		const nodes: ConfigNode[] = []
		let current: ConfigContainer = this
		while (current instanceof ConfigNode) {
			nodes.unshift(current)
			current = current.parent
		}
		return nodes
	}

	get isLeaf(): boolean {
		return !this.hasChildren
	}

	/** Own tags plus every tag carried by a descendant */
	get effectiveTags(): Set<string> {
		const tags = new Set(this.tags)
		for (const node of this.allNodes()) {
			for (const tag of node.tags) tags.add(tag)
		}
		return tags
	}

	/** Detach from the parent container */
	delete(): boolean {
		return this.parent.deleteChild(this)
	}
}

function* walk(container: ConfigContainer): Generator<ConfigNode> {
	for (const child of container.children) {
		yield child
		yield* walk(child)
	}
}

function sortedByText(nodes: readonly ConfigNode[]): ConfigNode[] {
	return [...nodes].sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0))
}

function repeatedTexts(nodes: readonly ConfigNode[]): Set<string> {
	const seen = new Set<string>()
	const repeated = new Set<string>()
	for (const node of nodes) {
		if (seen.has(node.text)) repeated.add(node.text)
		seen.add(node.text)
	}
	return repeated
}
