import type { IEncoder } from '@/protocol/primitives/types.js'

/**
 * Return the next power of 2 >= value
 */
function nextPowerOfTwo(value: number): number {
	if (value <= 0) return 1
	value--
	value |= value >> 1
	value |= value >> 2
	value |= value >> 4
	value |= value >> 8
	value |= value >> 16
	return value + 1
}

/**
 * Big-endian binary encoder
 * Uses dynamic buffer expansion with power-of-2 growth
 */
export class Encoder implements IEncoder {
	private buffer: Buffer
	private position: number

	constructor(initialSize: number = 64) {
		this.buffer = Buffer.allocUnsafe(nextPowerOfTwo(initialSize))
		this.position = 0
	}

	private ensureCapacity(bytes: number): void {
		const required = this.position + bytes
		if (required > this.buffer.length) {
			const grown = Buffer.allocUnsafe(nextPowerOfTwo(required))
			this.buffer.copy(grown, 0, 0, this.position)
			this.buffer = grown
		}
	}

	writeInt16(value: number): this {
		this.ensureCapacity(2)
		this.buffer.writeInt16BE(value, this.position)
		this.position += 2
		return this
	}

	writeInt32(value: number): this {
		this.ensureCapacity(4)
		this.buffer.writeInt32BE(value, this.position)
		this.position += 4
		return this
	}

	writeString(value: string): this {
		const bytes = Buffer.from(value, 'utf-8')
		this.writeInt16(bytes.length)
		this.writeRaw(bytes)
		return this
	}

	writeRaw(data: Buffer): this {
		this.ensureCapacity(data.length)
		data.copy(this.buffer, this.position)
		this.position += data.length
		return this
	}

	toBuffer(): Buffer {
		return this.buffer.subarray(0, this.position)
	}

	size(): number {
		return this.position
	}
}
