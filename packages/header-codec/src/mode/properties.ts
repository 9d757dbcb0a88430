/**
 * Minimal `.properties` reader
 *
 * Understands what a broker config file needs for key lookup:
 * - `#` and `!` comment lines, blank lines
 * - `key=value`, `key: value` and `key value` separators
 * - trailing backslash line continuations (never on comment lines)
 *
 * Unicode escapes and escaped separators inside keys are not interpreted.
 */

export class Properties {
	private readonly entries: ReadonlyMap<string, string>

	constructor(entries: Iterable<readonly [string, string]> = []) {
		this.entries = new Map(entries)
	}

	get(key: string): string | undefined {
		return this.entries.get(key)
	}

	has(key: string): boolean {
		return this.entries.has(key)
	}

	/**
	 * `true` only for a value equal to "true" ignoring case; absent or
	 * anything else (including trailing whitespace) reads as `false`
	 */
	getBoolean(key: string): boolean {
		const value = this.entries.get(key)
		return value !== undefined && value.toLowerCase() === 'true'
	}

	get size(): number {
		return this.entries.size
	}

	static fromRecord(record: Record<string, string>): Properties {
		return new Properties(Object.entries(record))
	}
}

function isComment(line: string): boolean {
	const trimmed = line.trimStart()
	return trimmed.startsWith('#') || trimmed.startsWith('!')
}

function logicalLines(text: string): string[] {
	const lines: string[] = []
	let pending: string | undefined

	for (const raw of text.split(/\r\n|\r|\n/)) {
		// Comment lines never continue
		if (pending === undefined && isComment(raw)) {
			lines.push(raw)
			continue
		}
		const line = pending === undefined ? raw : pending + raw.trimStart()
		// An odd number of trailing backslashes continues the line
		const trailing = /\\*$/.exec(line)?.[0].length ?? 0
		if (trailing % 2 === 1) {
			pending = line.slice(0, -1)
			continue
		}
		lines.push(line)
		pending = undefined
	}
	if (pending !== undefined) {
		lines.push(pending)
	}
	return lines
}

/**
 * Parse properties text; later duplicates win
 */
export function parseProperties(text: string): Properties {
	const entries: Array<[string, string]> = []

	for (const line of logicalLines(text)) {
		const trimmed = line.trimStart()
		if (trimmed === '' || isComment(trimmed)) {
			continue
		}

		const match = /^([^=:\s]+)\s*[=:\s]\s*(.*)$/.exec(trimmed)
		if (match) {
			// leading whitespace of the value is dropped, trailing is kept
			entries.push([match[1] ?? '', match[2] ?? ''])
		} else {
			// key without a value
			entries.push([trimmed.trim(), ''])
		}
	}

	return new Properties(entries)
}
