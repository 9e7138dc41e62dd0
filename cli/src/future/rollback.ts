import { FutureProjector, type RemediationTree } from "../../../src/shared/remediation/index.js"
import { logs } from "../services/logs.js"
import { loadRules, readConfigTree } from "../shared/inputs.js"
import { formatTree, reportDiagnostics } from "../shared/output.js"

export type RollbackCliArgs = {
	workspaceRoot?: string
	runningPath: string
	targetPath: string
	driver?: string
	comments?: boolean
	json?: boolean
}

export type RollbackCliResult = {
	rollback: RemediationTree
	output: string
}

/** Remediation that returns the predicted future config to the running one */
export async function runRollbackCli(args: RollbackCliArgs): Promise<RollbackCliResult> {
	const { workspaceRoot = process.cwd(), runningPath, targetPath } = args

	const rules = await loadRules(args.driver)
	const projector = new FutureProjector(rules)
	const running = await readConfigTree(runningPath, rules, workspaceRoot)
	const target = await readConfigTree(targetPath, rules, workspaceRoot)

	const future = projector.predictFromTarget(running, target)
	const rollback = projector.rollback(future, running)
	reportDiagnostics(rollback, "Rollback")

	logs.info(`Rollback has ${rollback.lineCount} lines`, "Rollback")
	return { rollback, output: formatTree(rollback, rules, args) }
}
