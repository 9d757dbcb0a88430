import { TextDecoder } from 'node:util'

import { MalformedHeaderError } from '@/errors.js'
import type { IDecoder } from '@/protocol/primitives/types.js'

// Rejects invalid UTF-8 instead of substituting U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Forward-only big-endian decoder over a single buffer
 *
 * Every read is bounds-checked up front; a short buffer raises
 * MalformedHeaderError and leaves the position where the read started.
 */
export class Decoder implements IDecoder {
	private readonly buffer: Buffer
	private position: number

	constructor(buffer: Buffer, initialOffset: number = 0) {
		this.buffer = buffer
		this.position = initialOffset
	}

	private ensureAvailable(bytes: number): void {
		const remaining = this.buffer.length - this.position
		if (bytes > remaining) {
			throw new MalformedHeaderError(
				`Buffer underflow: need ${bytes} bytes but only ${remaining} remaining`,
				this.position,
				bytes,
				remaining
			)
		}
	}

	readInt16(): number {
		this.ensureAvailable(2)
		const value = this.buffer.readInt16BE(this.position)
		this.position += 2
		return value
	}

	readInt32(): number {
		this.ensureAvailable(4)
		const value = this.buffer.readInt32BE(this.position)
		this.position += 4
		return value
	}

	readString(): string {
		const start = this.position
		const length = this.readInt16()
		if (length < 0) {
			this.position = start
			throw new MalformedHeaderError(`Invalid string length ${length}`, start, 2, this.buffer.length - start)
		}
		const remaining = this.buffer.length - this.position
		if (length > remaining) {
			this.position = start
			throw new MalformedHeaderError(
				`String length ${length} exceeds ${remaining} remaining bytes`,
				start,
				length + 2,
				remaining + 2
			)
		}
		let value: string
		try {
			value = utf8.decode(this.buffer.subarray(this.position, this.position + length))
		} catch (error) {
			this.position = start
			if (error instanceof TypeError) {
				throw new MalformedHeaderError(
					`String of ${length} bytes is not valid UTF-8`,
					start,
					length + 2,
					remaining + 2,
					error
				)
			}
			throw error
		}
		this.position += length
		return value
	}

	readRaw(length: number): Buffer {
		this.ensureAvailable(length)
		const value = this.buffer.subarray(this.position, this.position + length)
		this.position += length
		return value
	}

	remaining(): number {
		return this.buffer.length - this.position
	}

	offset(): number {
		return this.position
	}
}
