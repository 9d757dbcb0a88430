/**
 * Error hierarchy for the request header codec
 *
 * Every error carries a `fatal` flag: fatal errors mean the process cannot
 * continue encoding headers (bad configuration, programming defects), while
 * non-fatal ones are scoped to a single decode/construct call.
 */

/**
 * Base class for all header codec errors
 */
export class HeaderCodecError extends Error {
	/** Whether the error should abort initialization rather than a single call */
	readonly fatal: boolean

	override readonly cause?: Error

	constructor(message: string, fatal: boolean, cause?: Error) {
		super(message)
		this.name = 'HeaderCodecError'
		this.fatal = fatal
		this.cause = cause

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * The configuration resource exists but could not be read
 */
export class ConfigIOError extends HeaderCodecError {
	readonly path: string

	constructor(path: string, cause?: Error) {
		const causeStr = cause ? `: ${cause.message}` : ''
		super(`Failed to read configuration resource ${path}${causeStr}`, true, cause)
		this.name = 'ConfigIOError'
		this.path = path
	}
}

/**
 * Header bytes are truncated or carry an invalid string length
 */
export class MalformedHeaderError extends HeaderCodecError {
	/** Cursor position where the read was attempted */
	readonly offset: number
	readonly needed: number
	readonly remaining: number

	/** Schema field being read, when known */
	field?: string

	constructor(message: string, offset: number, needed: number, remaining: number, cause?: Error) {
		super(message, false, cause)
		this.name = 'MalformedHeaderError'
		this.offset = offset
		this.needed = needed
		this.remaining = remaining
	}
}

/**
 * A field name outside the active layout was requested
 */
export class UnknownFieldError extends HeaderCodecError {
	readonly field: string
	readonly secure: boolean

	constructor(field: string, secure: boolean) {
		super(`Unknown header field '${field}' in ${secure ? 'secure' : 'legacy'} layout`, true)
		this.name = 'UnknownFieldError'
		this.field = field
		this.secure = secure
	}
}

/**
 * Header values rejected at construction
 */
export class InvalidHeaderError extends HeaderCodecError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid request header: ${issues.join('; ')}`, false)
		this.name = 'InvalidHeaderError'
		this.issues = issues
	}
}

/**
 * Resolver or codec options failed validation
 */
export class InvalidConfigError extends HeaderCodecError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`, true)
		this.name = 'InvalidConfigError'
		this.issues = issues
	}
}
