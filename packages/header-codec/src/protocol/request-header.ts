/**
 * Request header value object
 */

import { z } from 'zod'

import { InvalidHeaderError } from '@/errors.js'

const INT16_MIN = -0x8000
const INT16_MAX = 0x7fff
const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff

const int16 = z.number().int().min(INT16_MIN).max(INT16_MAX)
const int32 = z.number().int().min(INT32_MIN).max(INT32_MAX)

// Strings carry an INT16 byte-length prefix on the wire
const wireString = z
	.string()
	.refine(value => Buffer.byteLength(value, 'utf-8') <= INT16_MAX, {
		message: `encoded length exceeds ${INT16_MAX} bytes`,
	})

export const requestHeaderSchema = z.object({
	apiKey: int16,
	apiVersion: int16,
	clientId: wireString,
	clientVersion: wireString.optional(),
	correlationId: int32,
})

export type RequestHeaderInit = z.input<typeof requestHeaderSchema>

/**
 * Immutable request header
 *
 * `clientVersion` is only ever present for headers read from or normalized for
 * the secure layout; the codec decides that, not the caller.
 */
export class RequestHeader {
	readonly apiKey: number
	readonly apiVersion: number
	readonly clientId: string
	readonly clientVersion?: string
	readonly correlationId: number

	private constructor(init: z.output<typeof requestHeaderSchema>) {
		this.apiKey = init.apiKey
		this.apiVersion = init.apiVersion
		this.clientId = init.clientId
		if (init.clientVersion !== undefined) {
			this.clientVersion = init.clientVersion
		}
		this.correlationId = init.correlationId
		Object.freeze(this)
	}

	/**
	 * Validate and build a header
	 *
	 * @throws InvalidHeaderError when a field is out of range for its wire type
	 */
	static create(init: RequestHeaderInit): RequestHeader {
		const result = requestHeaderSchema.safeParse(init)
		if (!result.success) {
			throw new InvalidHeaderError(
				result.error.issues.map(issue => `${issue.path.join('.') || 'header'}: ${issue.message}`)
			)
		}
		return new RequestHeader(result.data)
	}

	/**
	 * Copy of this header carrying the given client version
	 */
	withClientVersion(clientVersion: string | undefined): RequestHeader {
		return RequestHeader.create({ ...this.toJSON(), clientVersion })
	}

	equals(other: RequestHeader): boolean {
		return (
			this.apiKey === other.apiKey &&
			this.apiVersion === other.apiVersion &&
			this.clientId === other.clientId &&
			this.clientVersion === other.clientVersion &&
			this.correlationId === other.correlationId
		)
	}

	toJSON(): RequestHeaderInit {
		const json: RequestHeaderInit = {
			apiKey: this.apiKey,
			apiVersion: this.apiVersion,
			clientId: this.clientId,
			correlationId: this.correlationId,
		}
		if (this.clientVersion !== undefined) {
			json.clientVersion = this.clientVersion
		}
		return json
	}

	toString(): string {
		const version = this.clientVersion === undefined ? '' : `, clientVersion=${this.clientVersion}`
		return `RequestHeader(apiKey=${this.apiKey}, apiVersion=${this.apiVersion}, clientId=${this.clientId}${version}, correlationId=${this.correlationId})`
	}
}
