// Protocol layer exports
export * from '@/protocol/index.js'

// Mode resolution
export * from '@/mode/index.js'

// Configuration
export {
	DEFAULT_CONFIG_PATH,
	DEFAULT_PROPERTY_KEY,
	resolveModeResolverSettings,
	type ModeResolverConfig,
	type ResolvedModeResolverSettings,
} from '@/config.js'

// Errors
export {
	HeaderCodecError,
	ConfigIOError,
	MalformedHeaderError,
	UnknownFieldError,
	InvalidHeaderError,
	InvalidConfigError,
} from '@/errors.js'

// Logger
export { createLogger, noopLogger, type Logger, type LogLevel, type LogContext } from '@/logger.js'
