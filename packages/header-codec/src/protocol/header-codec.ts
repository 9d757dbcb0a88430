/**
 * Request header encoding and decoding
 *
 * The codec is bound to one layout at construction. In the secure layout the
 * client_version field always carries CLIENT_VERSION_TAG: whatever the caller
 * put in `clientVersion` is replaced before encoding. The caller's header is
 * never mutated; normalization returns a new value.
 */

import type { ModeResolverConfig } from '@/config.js'
import { InvalidHeaderError, MalformedHeaderError } from '@/errors.js'
import { getDefaultModeResolver, type ModeResolver } from '@/mode/mode-resolver.js'
import { Decoder, Encoder, type IDecoder, type IEncoder } from '@/protocol/primitives/index.js'
import { RequestHeader } from '@/protocol/request-header.js'
import { fieldOf, layoutFor, minimumSize, type HeaderField, type HeaderLayout } from '@/protocol/schema.js'

/** Client identification tag written into client_version in the secure layout */
export const CLIENT_VERSION_TAG = 'cmss-client'

export interface HeaderCodecOptions {
	/** Use the secure layout */
	secure: boolean
}

export class HeaderCodec {
	readonly layout: HeaderLayout

	constructor(options: HeaderCodecOptions) {
		this.layout = layoutFor(options.secure)
	}

	get secure(): boolean {
		return this.layout.secure
	}

	/**
	 * Field definition in the active layout
	 *
	 * @throws UnknownFieldError for names outside the layout
	 */
	field(name: string): HeaderField {
		return fieldOf(this.layout, name)
	}

	/**
	 * Bring a header in line with the layout: the sentinel tag in secure
	 * mode, no client version otherwise
	 */
	normalize(header: RequestHeader): RequestHeader {
		const clientVersion = this.secure ? CLIENT_VERSION_TAG : undefined
		if (header.clientVersion === clientVersion) {
			return header
		}
		return header.withClientVersion(clientVersion)
	}

	/**
	 * Encode a header into a new buffer
	 */
	encode(header: RequestHeader): Buffer {
		const normalized = this.normalize(header)
		const encoder = new Encoder(this.normalizedSize(normalized))
		this.writeNormalized(encoder, normalized)
		return encoder.toBuffer()
	}

	/**
	 * Encode a header onto an existing encoder, e.g. ahead of a request body
	 */
	encodeInto(encoder: IEncoder, header: RequestHeader): void {
		this.writeNormalized(encoder, this.normalize(header))
	}

	/**
	 * Exact encoded length of a header in this layout
	 */
	sizeOf(header: RequestHeader): number {
		return this.normalizedSize(this.normalize(header))
	}

	/**
	 * Decode a header from the start of a buffer; trailing bytes are ignored
	 *
	 * @throws MalformedHeaderError on truncated input, invalid string lengths or invalid UTF-8
	 */
	decode(buffer: Buffer): RequestHeader {
		return this.readFrom(new Decoder(buffer))
	}

	/**
	 * Read a header from a decoder, leaving it positioned just after the header
	 */
	readFrom(decoder: IDecoder): RequestHeader {
		const start = decoder.offset()
		let apiKey = 0
		let apiVersion = 0
		let clientId = ''
		let clientVersion: string | undefined
		let correlationId = 0

		for (const field of this.layout.fields) {
			try {
				switch (field.name) {
					case 'api_key':
						apiKey = decoder.readInt16()
						break
					case 'api_version':
						apiVersion = decoder.readInt16()
						break
					case 'client_id':
						clientId = decoder.readString()
						break
					case 'client_version':
						clientVersion = decoder.readString()
						break
					case 'correlation_id':
						correlationId = decoder.readInt32()
						break
				}
			} catch (error) {
				if (error instanceof MalformedHeaderError) {
					error.field = field.name
				}
				throw error
			}
		}

		try {
			return RequestHeader.create({ apiKey, apiVersion, clientId, clientVersion, correlationId })
		} catch (error) {
			if (error instanceof InvalidHeaderError) {
				const consumed = decoder.offset() - start
				throw new MalformedHeaderError(error.message, start, consumed, consumed, error)
			}
			throw error
		}
	}

	private writeNormalized(encoder: IEncoder, header: RequestHeader): void {
		for (const field of this.layout.fields) {
			switch (field.name) {
				case 'api_key':
					encoder.writeInt16(header.apiKey)
					break
				case 'api_version':
					encoder.writeInt16(header.apiVersion)
					break
				case 'client_id':
					encoder.writeString(header.clientId)
					break
				case 'client_version':
					encoder.writeString(header.clientVersion ?? CLIENT_VERSION_TAG)
					break
				case 'correlation_id':
					encoder.writeInt32(header.correlationId)
					break
			}
		}
	}

	private normalizedSize(header: RequestHeader): number {
		let size = minimumSize(this.layout) + Buffer.byteLength(header.clientId, 'utf-8')
		if (header.clientVersion !== undefined) {
			size += Buffer.byteLength(header.clientVersion, 'utf-8')
		}
		return size
	}
}

export interface CreateHeaderCodecOptions extends ModeResolverConfig {
	/** Explicit layout; skips mode resolution entirely */
	secure?: boolean

	/** Resolver to consult when `secure` is not given (default: the process-wide resolver) */
	resolver?: ModeResolver
}

/**
 * Build a codec for the process mode, resolving it on first use
 *
 * @throws ConfigIOError when the configuration resource cannot be read
 */
export function createHeaderCodec(options: CreateHeaderCodecOptions = {}): HeaderCodec {
	const { secure, resolver, ...config } = options
	if (secure !== undefined) {
		return new HeaderCodec({ secure })
	}
	return new HeaderCodec({ secure: (resolver ?? getDefaultModeResolver(config)).resolve() })
}
