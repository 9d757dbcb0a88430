import { afterEach, describe, expect, it, vi } from 'vitest'

import { MalformedHeaderError, UnknownFieldError } from '@/errors.js'
import { MapConfigSource } from '@/mode/config-source.js'
import { ModeResolver, resetDefaultModeResolver } from '@/mode/mode-resolver.js'
import { CLIENT_VERSION_TAG, HeaderCodec, createHeaderCodec } from '@/protocol/header-codec.js'
import { Decoder, Encoder } from '@/protocol/primitives/index.js'
import { RequestHeader } from '@/protocol/request-header.js'

const header = RequestHeader.create({ apiKey: 3, apiVersion: 1, clientId: 'my-client', correlationId: 42 })

describe('HeaderCodec (legacy layout)', () => {
	const codec = new HeaderCodec({ secure: false })

	it('encodes the four-field layout', () => {
		const bytes = codec.encode(header)
		expect(bytes.length).toBe(19)
		expect(bytes.toString('hex')).toBe('0003' + '0001' + '0009' + Buffer.from('my-client').toString('hex') + '0000002a')
	})

	it('decodes its own output', () => {
		const decoded = codec.decode(codec.encode(header))
		expect(decoded.apiKey).toBe(3)
		expect(decoded.apiVersion).toBe(1)
		expect(decoded.clientId).toBe('my-client')
		expect(decoded.correlationId).toBe(42)
		expect(decoded.clientVersion).toBeUndefined()
		expect(decoded.equals(header)).toBe(true)
	})

	it('omits a caller-supplied clientVersion entirely', () => {
		const withVersion = header.withClientVersion('v9')
		expect(codec.encode(withVersion)).toEqual(codec.encode(header))
		expect(codec.sizeOf(withVersion)).toBe(19)
	})

	it('round-trips negative and multi-byte values', () => {
		const unusual = RequestHeader.create({ apiKey: -1, apiVersion: -32768, clientId: 'café', correlationId: -2147483648 })
		expect(codec.sizeOf(unusual)).toBe(15)
		expect(codec.decode(codec.encode(unusual)).equals(unusual)).toBe(true)
	})

	it('fails on buffers shorter than the layout minimum', () => {
		expect(() => codec.decode(Buffer.alloc(7))).toThrow(MalformedHeaderError)
		expect(() => codec.decode(Buffer.alloc(0))).toThrow('Buffer underflow: need 2 bytes but only 0 remaining')
	})

	it('names the field that was truncated', () => {
		const truncated = codec.encode(header).subarray(0, 15)
		let caught: unknown
		try {
			codec.decode(truncated)
		} catch (error) {
			caught = error
		}
		expect(caught).toBeInstanceOf(MalformedHeaderError)
		expect(caught).toMatchObject({ field: 'correlation_id', offset: 15, needed: 4, remaining: 0 })
	})

	it('fails when a string length exceeds the remaining bytes', () => {
		const bytes = Buffer.from([0x00, 0x03, 0x00, 0x01, 0x00, 0x20, 0x61, 0x62])
		expect(() => codec.decode(bytes)).toThrow('String length 32 exceeds 2 remaining bytes')
	})

	it('fails on negative string lengths', () => {
		const bytes = Buffer.from([0x00, 0x03, 0x00, 0x01, 0xff, 0xff, 0x00, 0x00, 0x00, 0x00])
		expect(() => codec.decode(bytes)).toThrow('Invalid string length -1')
	})

	it('fails on client ids that are not valid UTF-8', () => {
		const bytes = Buffer.concat([
			Buffer.from([0x00, 0x03, 0x00, 0x01, 0x4e, 0x20]),
			Buffer.alloc(20000, 0xff),
			Buffer.from([0x00, 0x00, 0x00, 0x2a]),
		])
		let caught: unknown
		try {
			codec.decode(bytes)
		} catch (error) {
			caught = error
		}
		expect(caught).toBeInstanceOf(MalformedHeaderError)
		expect(caught).toMatchObject({
			message: 'String of 20000 bytes is not valid UTF-8',
			field: 'client_id',
			offset: 4,
		})
	})

	it('leaves trailing bytes for the caller', () => {
		const decoder = new Decoder(Buffer.concat([codec.encode(header), Buffer.from([0xca, 0xfe])]))
		expect(codec.readFrom(decoder).equals(header)).toBe(true)
		expect(decoder.offset()).toBe(19)
		expect(decoder.remaining()).toBe(2)
	})

	it('has no client_version field', () => {
		expect(codec.field('client_id').type).toBe('string')
		expect(() => codec.field('client_version')).toThrow(UnknownFieldError)
	})
})

describe('HeaderCodec (secure layout)', () => {
	const codec = new HeaderCodec({ secure: true })
	const ignored = header.withClientVersion('ignored')

	it('writes the sentinel tag instead of the caller value', () => {
		const bytes = codec.encode(ignored)
		expect(bytes.length).toBe(2 + 2 + (2 + 9) + (2 + 11) + 4)
		expect(bytes.subarray(15, 17).readInt16BE(0)).toBe(CLIENT_VERSION_TAG.length)
		expect(bytes.subarray(17, 28).toString('utf-8')).toBe('cmss-client')
		expect(bytes.includes(Buffer.from('ignored'))).toBe(false)
		expect(bytes.readInt32BE(28)).toBe(42)
	})

	it('writes the sentinel when the caller gave no version', () => {
		expect(codec.encode(header)).toEqual(codec.encode(ignored))
		expect(codec.sizeOf(header)).toBe(32)
	})

	it('does not mutate the caller header', () => {
		codec.encode(ignored)
		expect(ignored.clientVersion).toBe('ignored')
	})

	it('decodes the sentinel as the client version', () => {
		const decoded = codec.decode(codec.encode(ignored))
		expect(decoded.clientVersion).toBe(CLIENT_VERSION_TAG)
		expect(decoded.equals(ignored.withClientVersion(CLIENT_VERSION_TAG))).toBe(true)
	})

	it('normalize only copies when needed', () => {
		const tagged = header.withClientVersion(CLIENT_VERSION_TAG)
		expect(codec.normalize(tagged)).toBe(tagged)
		expect(codec.normalize(header).clientVersion).toBe(CLIENT_VERSION_TAG)
	})

	it('fails on a client version that is not valid UTF-8', () => {
		const bytes = Buffer.from([0x00, 0x03, 0x00, 0x01, 0x00, 0x00, 0x00, 0x02, 0xc3, 0x28, 0x00, 0x00, 0x00, 0x2a])
		expect(() => codec.decode(bytes)).toThrow(MalformedHeaderError)
		expect(() => codec.decode(bytes)).toThrow('String of 2 bytes is not valid UTF-8')
	})

	it('validates the header once per encode', () => {
		const create = vi.spyOn(RequestHeader, 'create')
		try {
			codec.encode(ignored)
			expect(create).toHaveBeenCalledTimes(1)
		} finally {
			create.mockRestore()
		}
	})

	it('rejects legacy bytes', () => {
		const legacy = new HeaderCodec({ secure: false }).encode(header)
		expect(() => codec.decode(legacy)).toThrow(MalformedHeaderError)
	})

	it('appends after existing encoder content', () => {
		const encoder = new Encoder().writeInt32(7)
		codec.encodeInto(encoder, header)
		const decoder = new Decoder(encoder.toBuffer(), 4)
		expect(codec.readFrom(decoder).clientVersion).toBe(CLIENT_VERSION_TAG)
		expect(decoder.remaining()).toBe(0)
	})
})

describe('createHeaderCodec', () => {
	afterEach(() => {
		resetDefaultModeResolver()
	})

	it('uses an explicit mode without resolving', () => {
		const resolver = new ModeResolver({ source: new MapConfigSource() })
		expect(createHeaderCodec({ secure: false, resolver }).secure).toBe(false)
		expect(resolver.isResolved()).toBe(false)
	})

	it('resolves the mode through the given resolver', () => {
		const source = new MapConfigSource({
			'config/server.properties': { 'verify.client.version.enable': 'false' },
		})
		const codec = createHeaderCodec({ resolver: new ModeResolver({ source }) })
		expect(codec.secure).toBe(false)
		expect(codec.layout.fields).toHaveLength(4)
	})

	it('falls back to the process-wide resolver', () => {
		const codec = createHeaderCodec({ source: new MapConfigSource() })
		expect(codec.secure).toBe(true)
	})
})
