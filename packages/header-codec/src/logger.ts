/**
 * Structured JSON logging
 *
 * One JSON object per line on the console; warnings and errors go to stderr.
 */

/**
 * Log levels, most to least severe; 'silent' disables output
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export type LogContext = Record<string, unknown>

export interface Logger {
	error(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	debug(message: string, context?: LogContext): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: LogContext): Logger
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: LogContext
	) {}

	private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		const output = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error' || level === 'warn') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: LogContext): void {
		this.write('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.write('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.write('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.write('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { service: 'gateway' })
 * logger.warn('configuration resource not found', { path: 'config/server.properties' })
 * // stderr: {"level":"warn","message":"configuration resource not found","timestamp":"...","service":"gateway","path":"config/server.properties"}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: LogContext = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

export const noopLogger: Logger = new NoopLogger()
