import { access, readFile } from "node:fs/promises"
import * as path from "node:path"

export async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath)
		return true
	} catch {
		return false
	}
}

export async function readTextFile(filePath: string): Promise<string> {
	return readFile(filePath, "utf8")
}

export function toPosixPath(filePath: string): string {
	// normalize Windows paths for messages and dumps
	return filePath.split(path.sep).join("/")
}
