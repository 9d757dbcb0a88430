import { Properties } from '@/mode/properties.js'

/**
 * Result of probing for a configuration resource
 */
export type ConfigLookup =
	| {
			found: false
			/** Every location that was probed */
			locations: string[]
	  }
	| {
			found: true
			/** Where the resource was read from */
			location: string
			properties: Properties
	  }

/**
 * Environment prober used for mode resolution
 *
 * Implementations return `found: false` when the resource does not exist and
 * throw ConfigIOError when it exists but cannot be read.
 */
export interface ConfigSource {
	lookup(path: string): ConfigLookup
}

/**
 * In-memory config source keyed by relative path
 */
export class MapConfigSource implements ConfigSource {
	private readonly resources = new Map<string, Properties>()

	constructor(resources: Record<string, Record<string, string>> = {}) {
		for (const [path, record] of Object.entries(resources)) {
			this.resources.set(path, Properties.fromRecord(record))
		}
	}

	set(path: string, record: Record<string, string>): this {
		this.resources.set(path, Properties.fromRecord(record))
		return this
	}

	delete(path: string): this {
		this.resources.delete(path)
		return this
	}

	lookup(path: string): ConfigLookup {
		const properties = this.resources.get(path)
		if (!properties) {
			return { found: false, locations: [`memory:${path}`] }
		}
		return { found: true, location: `memory:${path}`, properties }
	}
}
