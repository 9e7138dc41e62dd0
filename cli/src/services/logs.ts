import { z } from "zod"

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"])

export type LogLevel = z.infer<typeof logLevelSchema>

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export type LogEntry = {
	level: Exclude<LogLevel, "silent">
	message: string
	source: string
	ts: string
	meta?: Record<string, unknown>
}

export type LogSink = (line: string) => void

/**
 * LogsService - Leveled logging for the CLI
 *
 * Everything goes to stderr so stdout stays reserved for command output
 * (configs, JSON dumps, patches). The level comes from HIERTREE_LOG_LEVEL
 * unless a command raises it with --verbose.
 */
export class LogsService {
	private level: LogLevel
	private json = false

	constructor(
		level: LogLevel = LogsService.levelFromEnv(),
		private readonly sink: LogSink = (line) => console.error(line),
	) {
		this.level = level
	}

	static levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
		const parsed = logLevelSchema.safeParse(env.HIERTREE_LOG_LEVEL?.toLowerCase())
		return parsed.success ? parsed.data : "info"
	}

	getLevel(): LogLevel {
		return this.level
	}

	setLevel(level: LogLevel): void {
		this.level = level
	}

	/** Emit one JSON object per entry instead of a bracketed line */
	setJson(json: boolean): void {
		this.json = json
	}

	debug(message: string, source: string, meta?: Record<string, unknown>): void {
		this.write({ level: "debug", message, source, ts: new Date().toISOString(), meta })
	}

	info(message: string, source: string, meta?: Record<string, unknown>): void {
		this.write({ level: "info", message, source, ts: new Date().toISOString(), meta })
	}

	warn(message: string, source: string, meta?: Record<string, unknown>): void {
		this.write({ level: "warn", message, source, ts: new Date().toISOString(), meta })
	}

	error(message: string, source: string, meta?: Record<string, unknown>): void {
		this.write({ level: "error", message, source, ts: new Date().toISOString(), meta })
	}

	private write(entry: LogEntry): void {
		if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.level]) return

		if (this.json) {
			this.sink(JSON.stringify(entry))
			return
		}

		const meta = entry.meta ? ` ${JSON.stringify(entry.meta)}` : ""
		this.sink(`[${entry.source}] ${entry.level}: ${entry.message}${meta}`)
	}
}

export const logs = new LogsService()
