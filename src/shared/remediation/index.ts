/**
 * Remediation engine
 *
 * Public exports for parsing configs into trees, diffing them under vendor
 * rules, and projecting the config a remediation leaves behind.
 */

// Errors
export {
	DriverLoadError,
	InvalidRangeError,
	InvalidRulePatternError,
	MalformedHierarchyError,
	formatZodIssues,
} from "./errors"

// Tree model
export * from "./tree"

// Rules
export * from "./rules"

// Comparison
export * from "./diff"

// Future state
export {
	FutureProjector,
	planSteps,
	predict,
	predictFromTarget,
	rollback,
	type PlannedStep,
} from "./future/FutureProjector"

// Tags
export {
	Tagger,
	applyTags,
	filterByTag,
	filterByTags,
	lineIncluded,
	type TagFilter,
	type TagSource,
} from "./tagging/Tagger"

// Text front end and output
export { convertToSetCommands, expandRange, parseConfig, parseLines, tokenizeLines } from "./text/parse"
export { orderedChildren, renderLines, renderText, type RenderOptions } from "./text/render"
export { dumpTree, treeFromDump } from "./text/dump"

// Drivers
export {
	BUILTIN_DRIVERS,
	builtinDriverPath,
	isBuiltinDriver,
	loadDriver,
	loadDriverDefinition,
	parseDriverYaml,
	type BuiltinDriver,
} from "./drivers/loader"
