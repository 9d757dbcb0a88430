/**
 * One-shot secure mode resolution
 *
 * The broker side ships `config/server.properties`; when it is present the
 * `verify.client.version.enable` property decides the layout. When it is
 * absent the process is treated as a client and uses the secure layout.
 */

import { resolveModeResolverSettings, type ModeResolverConfig } from '@/config.js'
import { createLogger, noopLogger, type Logger } from '@/logger.js'
import type { ConfigSource } from '@/mode/config-source.js'
import { FileConfigSource } from '@/mode/file-config-source.js'

export class ModeResolver {
	private readonly source: ConfigSource
	private readonly configPath: string
	private readonly propertyKey: string
	private readonly logger: Logger
	private resolved: boolean | undefined

	constructor(config: ModeResolverConfig = {}) {
		const settings = resolveModeResolverSettings(config)
		this.source = config.source ?? new FileConfigSource()
		this.configPath = settings.configPath
		this.propertyKey = settings.propertyKey

		if (config.logger) {
			this.logger = config.logger.child({ component: 'mode-resolver' })
		} else if (settings.logLevel) {
			this.logger = createLogger(settings.logLevel, { component: 'mode-resolver' })
		} else {
			this.logger = noopLogger
		}
	}

	/**
	 * Secure mode flag, probed on the first call and cached afterwards
	 *
	 * @throws ConfigIOError when the resource exists but cannot be read; nothing is cached
	 */
	resolve(): boolean {
		if (this.resolved === undefined) {
			this.resolved = this.probe()
		}
		return this.resolved
	}

	isResolved(): boolean {
		return this.resolved !== undefined
	}

	private probe(): boolean {
		const lookup = this.source.lookup(this.configPath)

		if (!lookup.found) {
			this.logger.warn('configuration resource not found, treating process as client side with secure header', {
				path: this.configPath,
				locations: lookup.locations,
			})
			return true
		}

		const secure = lookup.properties.getBoolean(this.propertyKey)
		this.logger.info('resolved header mode from configuration', {
			location: lookup.location,
			property: this.propertyKey,
			value: lookup.properties.get(this.propertyKey) ?? null,
			secure,
		})
		return secure
	}
}

let defaultResolver: ModeResolver | undefined

/**
 * Process-wide resolver, created on first use with the given config
 *
 * Config passed after the first call is ignored.
 */
export function getDefaultModeResolver(config: ModeResolverConfig = {}): ModeResolver {
	defaultResolver ??= new ModeResolver(config)
	return defaultResolver
}

/**
 * Secure mode flag for this process
 */
export function resolveSecureMode(config: ModeResolverConfig = {}): boolean {
	return getDefaultModeResolver(config).resolve()
}

/**
 * Forget the process-wide resolver (test isolation only)
 */
export function resetDefaultModeResolver(): void {
	defaultResolver = undefined
}
