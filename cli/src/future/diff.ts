import * as path from "path"

import { createTwoFilesPatch } from "diff"

import { FutureProjector, renderText, unifiedDiff } from "../../../src/shared/remediation/index.js"
import { loadRules, readConfigTree } from "../shared/inputs.js"

export type DiffCliArgs = {
	workspaceRoot?: string
	runningPath: string
	targetPath: string
	driver?: string
	/** Tree-level +/- listing instead of a text patch */
	tree?: boolean
}

function normalizeNewlines(text: string): string {
	return text.replace(/\r\n/g, "\n")
}

/**
 * Unified text diff between the running config and the config it is predicted
 * to become, both rendered in the driver's indentation.
 */
export async function runDiffCli(args: DiffCliArgs): Promise<{ output: string }> {
	const { workspaceRoot = process.cwd(), runningPath, targetPath } = args

	const rules = await loadRules(args.driver)
	const running = await readConfigTree(runningPath, rules, workspaceRoot)
	const target = await readConfigTree(targetPath, rules, workspaceRoot)
	const future = new FutureProjector(rules).predictFromTarget(running, target)

	if (args.tree) {
		return { output: [...unifiedDiff(running, future, rules.indentation)].join("\n") }
	}

	const before = renderText(running, { indentation: rules.indentation }) + "\n"
	const after = renderText(future, { indentation: rules.indentation }) + "\n"
	if (before === after) {
		return { output: "" }
	}

	const fileName = path.basename(runningPath)
	return {
		output: normalizeNewlines(
			createTwoFilesPatch(`a/${fileName}`, `b/${fileName}`, before, after, "running", "future", { context: 3 }),
		),
	}
}
