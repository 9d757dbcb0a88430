export { Encoder } from '@/protocol/primitives/encoder.js'
export { Decoder } from '@/protocol/primitives/decoder.js'
export type { IEncoder, IDecoder } from '@/protocol/primitives/types.js'
