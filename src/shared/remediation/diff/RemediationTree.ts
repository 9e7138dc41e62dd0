import type { RemediationDiagnostic, RemediationOperation } from "@hiertree/types"

import type { ConfigNode } from "../tree/ConfigNode"
import { ConfigTree } from "../tree/ConfigTree"

/**
 * A ConfigTree whose lines carry `add` / `remove` operations, plus the
 * diagnostics recorded while it was computed.
 */
export class RemediationTree extends ConfigTree {
	readonly diagnostics: RemediationDiagnostic[] = []

	get isEmpty(): boolean {
		return !this.hasChildren
	}

	nodesWithOperation(operation: RemediationOperation): ConfigNode[] {
		return [...this.allNodes()].filter((node) => node.operation === operation)
	}

	override cloneEmpty(): RemediationTree {
		return new RemediationTree()
	}

	override deepCopy(): RemediationTree {
		const copy = this.cloneEmpty()
		copy.merge(this)
		copy.diagnostics.push(...this.diagnostics)
		return copy
	}
}
