import type { ZodIssue } from "zod"

/**
 * Raised when a line is more than one level deeper than its predecessor, or
 * an entry carries a depth below 1.
 */
export class MalformedHierarchyError extends Error {
	constructor(
		public readonly index: number,
		public readonly depth: number,
		public readonly previousDepth: number,
	) {
		super(
			`Malformed hierarchy at entry ${index}: depth ${depth} cannot follow depth ${previousDepth} ` +
				`(max ${previousDepth + 1}).`,
		)
		this.name = "MalformedHierarchyError"
	}
}

export class InvalidRangeError extends Error {
	constructor(
		public readonly range: string,
		reason: string,
	) {
		super(`Invalid range '${range}': ${reason}.`)
		this.name = "InvalidRangeError"
	}
}

export class InvalidRulePatternError extends Error {
	constructor(
		public readonly pattern: string,
		public readonly location: string,
		options?: ErrorOptions,
	) {
		super(`Invalid regular expression '${pattern}' at ${location}.`, options)
		this.name = "InvalidRulePatternError"
	}
}

export class DriverLoadError extends Error {
	constructor(
		public readonly source: string,
		message: string,
		public readonly issues: ZodIssue[] = [],
		options?: ErrorOptions,
	) {
		super(`Failed to load driver '${source}': ${message}`, options)
		this.name = "DriverLoadError"
	}
}

export function formatZodIssues(issues: readonly ZodIssue[]): string {
	return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ")
}
