import {
	dumpTree,
	renderText,
	type ConfigTree,
	type RemediationTree,
	type RuleSet,
} from "../../../src/shared/remediation/index.js"
import { logs } from "../services/logs.js"

export type OutputOptions = {
	comments?: boolean
	json?: boolean
}

/** Config text in the driver's indentation, or the JSON dump with `json` */
export function formatTree(tree: ConfigTree, rules: RuleSet, options: OutputOptions = {}): string {
	if (options.json) {
		return JSON.stringify(dumpTree(tree, rules.platform), null, 2)
	}
	return renderText(tree, {
		indentation: rules.indentation,
		comments: Boolean(options.comments),
		sectionalExiting: true,
	})
}

export function reportDiagnostics(tree: RemediationTree, source: string): void {
	for (const diagnostic of tree.diagnostics) {
		logs.warn(diagnostic.message, source, { path: diagnostic.path })
	}
}
