import * as fs from "fs/promises"
import * as path from "path"

import {
	convertToSetCommands,
	loadDriver,
	parseConfig,
	treeFromDump,
	type ConfigTree,
	type RuleSet,
} from "../../../src/shared/remediation/index.js"
import { logs } from "../services/logs.js"

export const DEFAULT_DRIVER = "generic"

export async function loadRules(driver: string = DEFAULT_DRIVER): Promise<RuleSet> {
	const rules = await loadDriver(driver)
	logs.debug(`Loaded driver '${rules.platform}'`, "Inputs", { rules: rules.rules.length })
	return rules
}

/**
 * Read a config file into a tree. Brace-style Junos text is flattened into set
 * commands first when the driver uses a declaration prefix.
 */
export async function readConfigTree(
	filePath: string,
	rules: RuleSet,
	workspaceRoot = process.cwd(),
): Promise<ConfigTree> {
	const absPath = path.resolve(workspaceRoot, filePath)
	let text = await fs.readFile(absPath, "utf8")

	if (rules.declarationPrefix && /\{\s*$/m.test(text)) {
		logs.debug("Converting brace-style config to set commands", "Inputs", { file: absPath })
		text = convertToSetCommands(text)
	}

	const tree = parseConfig(text, rules)
	logs.debug(`Parsed ${tree.lineCount} lines`, "Inputs", { file: absPath })
	return tree
}

/** A remediation written as config text, or a JSON dump produced by `--json` */
export async function readRemediationTree(
	filePath: string,
	rules: RuleSet,
	workspaceRoot = process.cwd(),
): Promise<ConfigTree> {
	const absPath = path.resolve(workspaceRoot, filePath)
	if (path.extname(absPath) !== ".json") {
		return readConfigTree(absPath, rules)
	}

	const raw = await fs.readFile(absPath, "utf8")
	return treeFromDump(JSON.parse(raw))
}
