/**
 * Binary encoder interface for request header serialization
 * All methods return `this` for fluent chaining
 */
export interface IEncoder {
	// Fixed-width integers (big-endian)
	writeInt16(value: number): this
	writeInt32(value: number): this

	// INT16 length + UTF-8
	writeString(value: string): this

	// Raw bytes and buffer management
	writeRaw(data: Buffer): this
	toBuffer(): Buffer
	size(): number
}

/**
 * Forward-only binary decoder interface
 */
export interface IDecoder {
	// Fixed-width integers (big-endian)
	readInt16(): number
	readInt32(): number

	// INT16 length + UTF-8, negative lengths rejected
	readString(): string

	readRaw(length: number): Buffer
	remaining(): number
	offset(): number
}
