import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'

import { ConfigIOError } from '@/errors.js'
import type { ConfigLookup, ConfigSource } from '@/mode/config-source.js'
import { parseProperties } from '@/mode/properties.js'

export interface FileConfigSourceOptions {
	/** Directories the relative path is resolved against, in order (default: [process.cwd()]) */
	roots?: string[]
}

/**
 * Filesystem config source
 *
 * The first root containing the path wins. Reads are synchronous: this only
 * runs once, during mode resolution.
 */
export class FileConfigSource implements ConfigSource {
	private readonly roots: string[]

	constructor(options: FileConfigSourceOptions = {}) {
		this.roots = options.roots ?? [process.cwd()]
	}

	lookup(path: string): ConfigLookup {
		const locations = this.roots.map(root => resolve(root, path))
		const location = locations.find(candidate => existsSync(candidate))

		if (location === undefined) {
			return { found: false, locations }
		}

		let text: string
		try {
			text = readFileSync(location, 'utf-8')
		} catch (error) {
			throw new ConfigIOError(location, error instanceof Error ? error : undefined)
		}

		return { found: true, location, properties: parseProperties(text) }
	}
}
