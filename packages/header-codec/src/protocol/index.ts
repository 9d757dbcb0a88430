export { Encoder, Decoder, type IEncoder, type IDecoder } from '@/protocol/primitives/index.js'
export {
	layoutFor,
	fieldOf,
	fixedWidthOf,
	minimumSize,
	type FieldType,
	type HeaderField,
	type HeaderFieldName,
	type HeaderLayout,
} from '@/protocol/schema.js'
export { RequestHeader, requestHeaderSchema, type RequestHeaderInit } from '@/protocol/request-header.js'
export {
	HeaderCodec,
	CLIENT_VERSION_TAG,
	createHeaderCodec,
	type HeaderCodecOptions,
	type CreateHeaderCodecOptions,
} from '@/protocol/header-codec.js'
