/**
 * Driver loader
 *
 * Reads a driver pack (YAML), validates it against the driver schema and
 * compiles it into a RuleSet. Built-in packs live in ./definitions.
 */

import * as path from "node:path"
import { fileURLToPath } from "node:url"

import YAML from "yaml"

import { driverDefinitionSchema, type DriverDefinition } from "@hiertree/types"

import { DriverLoadError, formatZodIssues } from "../errors"
import { fileExists, readTextFile, toPosixPath } from "../fs"
import { RuleSet } from "../rules/RuleSet"

export const BUILTIN_DRIVERS = ["generic", "cisco_ios", "juniper_junos", "hp_procurve"] as const

export type BuiltinDriver = (typeof BUILTIN_DRIVERS)[number]

const DEFINITIONS_DIR = fileURLToPath(new URL("./definitions/", import.meta.url))

export function isBuiltinDriver(name: string): name is BuiltinDriver {
	return BUILTIN_DRIVERS.some((builtin) => builtin === name)
}

export function builtinDriverPath(name: BuiltinDriver): string {
	return path.join(DEFINITIONS_DIR, `${name}.yaml`)
}

export function parseDriverYaml(yamlText: string, source = "<inline>"): DriverDefinition {
	let doc: unknown
	try {
		doc = YAML.parse(yamlText)
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		throw new DriverLoadError(source, `invalid YAML: ${message}`, [], { cause: error })
	}

	const result = driverDefinitionSchema.safeParse(doc)
	if (!result.success) {
		throw new DriverLoadError(source, formatZodIssues(result.error.issues), result.error.issues)
	}
	return result.data
}

/** Resolve a built-in driver name or a path to a YAML pack */
export async function loadDriverDefinition(nameOrPath: string): Promise<DriverDefinition> {
	const filePath = isBuiltinDriver(nameOrPath) ? builtinDriverPath(nameOrPath) : path.resolve(nameOrPath)

	if (!(await fileExists(filePath))) {
		throw new DriverLoadError(
			nameOrPath,
			`no such file; built-in drivers are ${BUILTIN_DRIVERS.join(", ")}`,
		)
	}

	return parseDriverYaml(await readTextFile(filePath), toPosixPath(filePath))
}

export async function loadDriver(nameOrPath: string): Promise<RuleSet> {
	return RuleSet.fromDefinition(await loadDriverDefinition(nameOrPath))
}
