import { applyTags, compare, filterByTags, type RemediationTree } from "../../../src/shared/remediation/index.js"
import { logs } from "../services/logs.js"
import { loadRules, readConfigTree } from "../shared/inputs.js"
import { formatTree, reportDiagnostics } from "../shared/output.js"

export type RemediationCliArgs = {
	workspaceRoot?: string
	runningPath: string
	targetPath: string
	driver?: string
	/** Keep only lines carrying one of these tags */
	includeTags?: string[]
	/** Drop lines carrying any of these tags */
	excludeTags?: string[]
	comments?: boolean
	json?: boolean
}

export type RemediationCliResult = {
	remediation: RemediationTree
	output: string
}

export async function runRemediationCli(args: RemediationCliArgs): Promise<RemediationCliResult> {
	const { workspaceRoot = process.cwd(), runningPath, targetPath, includeTags = [], excludeTags = [] } = args

	const rules = await loadRules(args.driver)
	const running = await readConfigTree(runningPath, rules, workspaceRoot)
	const target = await readConfigTree(targetPath, rules, workspaceRoot)

	let remediation = compare(running, target, rules)
	reportDiagnostics(remediation, "Remediation")

	if (includeTags.length > 0 || excludeTags.length > 0) {
		const filtered = filterByTags(applyTags(remediation, rules), { include: includeTags, exclude: excludeTags })
		filtered.diagnostics.push(...remediation.diagnostics)
		remediation = filtered
		logs.debug("Filtered remediation by tags", "Remediation", { includeTags, excludeTags })
	}

	logs.info(`Remediation has ${remediation.lineCount} lines`, "Remediation")
	return { remediation, output: formatTree(remediation, rules, args) }
}
