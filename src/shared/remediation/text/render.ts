import type { ConfigContainer, ConfigNode } from "../tree/ConfigNode"

export interface RenderOptions {
	/** Spaces per depth level (default 2) */
	indentation?: number
	/** Append ` !comment, comment` to lines that carry comments */
	comments?: boolean
	/** Emit `sectionExit` markers after the blocks that carry one */
	sectionalExiting?: boolean
}

/** Children in emission order: ordering weight ascending, ties kept in place */
export function orderedChildren(container: ConfigContainer): ConfigNode[] {
	return [...container.children].sort((a, b) => (a.orderWeight ?? 0) - (b.orderWeight ?? 0))
}

function renderLine(node: ConfigNode, width: number, comments: boolean): string {
	const line = `${" ".repeat(width * (node.depth - 1))}${node.text}`
	if (!comments || node.comments.size === 0) {
		return line
	}
	return `${line} !${[...node.comments].sort().join(", ")}`
}

export function* renderLines(container: ConfigContainer, options: RenderOptions = {}): Generator<string> {
	const width = options.indentation ?? 2

	for (const child of orderedChildren(container)) {
		yield renderLine(child, width, options.comments ?? false)
		yield* renderLines(child, options)

		if (options.sectionalExiting && child.sectionExit) {
			yield `${" ".repeat(width * child.depth)}${child.sectionExit}`
		}
	}
}

export function renderText(container: ConfigContainer, options: RenderOptions = {}): string {
	return [...renderLines(container, options)].join("\n")
}
