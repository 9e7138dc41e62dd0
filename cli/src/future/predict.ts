import { FutureProjector, type ConfigTree } from "../../../src/shared/remediation/index.js"
import { logs } from "../services/logs.js"
import { loadRules, readConfigTree, readRemediationTree } from "../shared/inputs.js"
import { formatTree } from "../shared/output.js"

export type FutureCliArgs = {
	workspaceRoot?: string
	runningPath: string
	/** Config text or a JSON dump; exclusive with targetPath */
	remediationPath?: string
	targetPath?: string
	driver?: string
	json?: boolean
}

export type FutureCliResult = {
	future: ConfigTree
	output: string
}

export async function runFutureCli(args: FutureCliArgs): Promise<FutureCliResult> {
	const { workspaceRoot = process.cwd(), runningPath, remediationPath, targetPath } = args

	if (remediationPath && targetPath) {
		throw new Error("Provide only one of --remediation or --target.")
	}

	const rules = await loadRules(args.driver)
	const projector = new FutureProjector(rules)
	const running = await readConfigTree(runningPath, rules, workspaceRoot)

	let future: ConfigTree
	if (remediationPath) {
		future = projector.predict(running, await readRemediationTree(remediationPath, rules, workspaceRoot))
	} else if (targetPath) {
		future = projector.predictFromTarget(running, await readConfigTree(targetPath, rules, workspaceRoot))
	} else {
		throw new Error("Provide either --remediation <file> or --target <file>.")
	}

	logs.info(`Predicted config has ${future.lineCount} lines`, "Future")
	return { future, output: formatTree(future, rules, args) }
}
