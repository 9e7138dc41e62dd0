#!/usr/bin/env node

import { Command } from "commander"

import { Package } from "./constants/package.js"
import { runDiffCli } from "./future/diff.js"
import { runFutureCli } from "./future/predict.js"
import { runRollbackCli } from "./future/rollback.js"
import { runRemediationCli } from "./remediation/run.js"
import { logs } from "./services/logs.js"

const program = new Command()

function collect(value: string, previous: string[]): string[] {
	return [...previous, value]
}

function fail(error: unknown): never {
	console.error(error instanceof Error ? error.message : String(error))
	process.exit(1)
}

program
	.name("hiertree")
	.description("Hierarchical network config diffing, remediation and future-state prediction")
	.version(Package.version)
	.option("-w, --workspace <path>", "Directory that config paths are relative to", process.cwd())
	.option("-d, --driver <name|path>", "Built-in driver name or path to a driver YAML", "generic")
	.option("--verbose", "Print debug logs (stderr)", false)
	.option("--log-json", "Print logs as JSON lines", false)
	.hook("preAction", (command) => {
		const options = command.opts()
		if (options.verbose) logs.setLevel("debug")
		if (options.logJson) logs.setJson(true)
		logs.debug(`Starting ${Package.name} ${Package.version}`, "Index", { options })
	})

// Remediation: commands that turn running into target
program
	.command("remediation")
	.description("Print the commands that turn the running config into the target config")
	.requiredOption("--running <path>", "Running config file")
	.requiredOption("--target <path>", "Target config file")
	.option("--tag <tag>", "Keep only lines with this tag (repeatable)", collect, [])
	.option("--exclude-tag <tag>", "Drop lines with this tag (repeatable)", collect, [])
	.option("--comments", "Append remediation comments to lines", false)
	.option("--json", "Print the remediation as a JSON tree dump", false)
	.action(async (options) => {
		const globals = program.opts()
		try {
			const result = await runRemediationCli({
				workspaceRoot: globals.workspace,
				driver: globals.driver,
				runningPath: options.running,
				targetPath: options.target,
				includeTags: options.tag,
				excludeTags: options.excludeTag,
				comments: Boolean(options.comments),
				json: Boolean(options.json),
			})
			if (result.output) console.log(result.output)
		} catch (error) {
			fail(error)
		}
	})

// Future: config expected after applying a remediation
program
	.command("future")
	.description("Print the config the device is expected to have after the change")
	.requiredOption("--running <path>", "Running config file")
	.option("--remediation <path>", "Remediation to apply (config text or JSON dump)")
	.option("--target <path>", "Target config; the remediation is computed first")
	.option("--json", "Print the predicted config as a JSON tree dump", false)
	.action(async (options) => {
		const globals = program.opts()
		try {
			const result = await runFutureCli({
				workspaceRoot: globals.workspace,
				driver: globals.driver,
				runningPath: options.running,
				remediationPath: options.remediation,
				targetPath: options.target,
				json: Boolean(options.json),
			})
			if (result.output) console.log(result.output)
		} catch (error) {
			fail(error)
		}
	})

program
	.command("rollback")
	.description("Print the commands that undo the change from running to target")
	.requiredOption("--running <path>", "Running config file")
	.requiredOption("--target <path>", "Target config file")
	.option("--comments", "Append remediation comments to lines", false)
	.option("--json", "Print the rollback as a JSON tree dump", false)
	.action(async (options) => {
		const globals = program.opts()
		try {
			const result = await runRollbackCli({
				workspaceRoot: globals.workspace,
				driver: globals.driver,
				runningPath: options.running,
				targetPath: options.target,
				comments: Boolean(options.comments),
				json: Boolean(options.json),
			})
			if (result.output) console.log(result.output)
		} catch (error) {
			fail(error)
		}
	})

program
	.command("diff")
	.description("Unified diff between the running config and its predicted future")
	.requiredOption("--running <path>", "Running config file")
	.requiredOption("--target <path>", "Target config file")
	.option("--tree", "Tree-level +/- listing instead of a text patch", false)
	.action(async (options) => {
		const globals = program.opts()
		try {
			const result = await runDiffCli({
				workspaceRoot: globals.workspace,
				driver: globals.driver,
				runningPath: options.running,
				targetPath: options.target,
				tree: Boolean(options.tree),
			})
			if (result.output) console.log(result.output)
		} catch (error) {
			fail(error)
		}
	})

program.parseAsync().catch(fail)
