/**
 * Resolver options and defaults
 */

import { z } from 'zod'

import { InvalidConfigError } from '@/errors.js'
import type { Logger, LogLevel } from '@/logger.js'
import type { ConfigSource } from '@/mode/config-source.js'

/** Broker configuration resource, relative to the probed roots */
export const DEFAULT_CONFIG_PATH = 'config/server.properties'

/** Broker property that turns on the secure header layout */
export const DEFAULT_PROPERTY_KEY = 'verify.client.version.enable'

/**
 * Mode resolver configuration
 */
export interface ModeResolverConfig {
	/** Environment prober (default: FileConfigSource rooted at process.cwd()) */
	source?: ConfigSource

	/** Relative path of the configuration resource (default: 'config/server.properties') */
	configPath?: string

	/** Boolean property selecting the secure layout (default: 'verify.client.version.enable') */
	propertyKey?: string

	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger

	/** Log level when using default logger */
	logLevel?: LogLevel
}

const logLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug'])

const modeResolverConfigSchema = z.object({
	configPath: z
		.string()
		.min(1)
		.refine(path => !path.startsWith('/'), { message: 'must be a relative path' })
		.default(DEFAULT_CONFIG_PATH),
	propertyKey: z.string().min(1).default(DEFAULT_PROPERTY_KEY),
	logLevel: logLevelSchema.optional(),
})

export type ResolvedModeResolverSettings = z.output<typeof modeResolverConfigSchema>

/**
 * Apply defaults to the scalar resolver settings
 *
 * @throws InvalidConfigError when a setting is malformed
 */
export function resolveModeResolverSettings(config: ModeResolverConfig): ResolvedModeResolverSettings {
	const result = modeResolverConfigSchema.safeParse({
		configPath: config.configPath,
		propertyKey: config.propertyKey,
		logLevel: config.logLevel,
	})
	if (!result.success) {
		throw new InvalidConfigError(
			result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
		)
	}
	return result.data
}
