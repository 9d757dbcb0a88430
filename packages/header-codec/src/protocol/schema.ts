/**
 * Request header wire layouts
 *
 * Legacy layout:
 *   api_key(int16) + api_version(int16) + client_id(string) + correlation_id(int32)
 *
 * Secure layout inserts client_version right after client_id:
 *   api_key(int16) + api_version(int16) + client_id(string) + client_version(string) + correlation_id(int32)
 *
 * Strings are an INT16 byte length followed by UTF-8 bytes. No padding.
 */

import { UnknownFieldError } from '@/errors.js'

export type FieldType = 'int16' | 'int32' | 'string'

export type HeaderFieldName = 'api_key' | 'api_version' | 'client_id' | 'client_version' | 'correlation_id'

export interface HeaderField {
	readonly name: HeaderFieldName
	readonly type: FieldType
}

export interface HeaderLayout {
	readonly secure: boolean
	readonly fields: readonly HeaderField[]
}

const API_KEY: HeaderField = { name: 'api_key', type: 'int16' }
const API_VERSION: HeaderField = { name: 'api_version', type: 'int16' }
const CLIENT_ID: HeaderField = { name: 'client_id', type: 'string' }
const CLIENT_VERSION: HeaderField = { name: 'client_version', type: 'string' }
const CORRELATION_ID: HeaderField = { name: 'correlation_id', type: 'int32' }

const LEGACY_LAYOUT: HeaderLayout = Object.freeze({
	secure: false,
	fields: Object.freeze([API_KEY, API_VERSION, CLIENT_ID, CORRELATION_ID]),
})

const SECURE_LAYOUT: HeaderLayout = Object.freeze({
	secure: true,
	fields: Object.freeze([API_KEY, API_VERSION, CLIENT_ID, CLIENT_VERSION, CORRELATION_ID]),
})

/**
 * Select the header layout for a mode
 */
export function layoutFor(secure: boolean): HeaderLayout {
	return secure ? SECURE_LAYOUT : LEGACY_LAYOUT
}

/**
 * Look up a field by name in a layout
 *
 * @throws UnknownFieldError when the layout has no such field
 */
export function fieldOf(layout: HeaderLayout, name: string): HeaderField {
	const field = layout.fields.find(candidate => candidate.name === name)
	if (!field) {
		throw new UnknownFieldError(name, layout.secure)
	}
	return field
}

/**
 * Bytes a field of this type occupies before any string payload
 */
export function fixedWidthOf(type: FieldType): number {
	switch (type) {
		case 'int16':
			return 2
		case 'int32':
			return 4
		case 'string':
			// length prefix only
			return 2
	}
}

/**
 * Smallest valid encoding of a layout (all strings empty)
 */
export function minimumSize(layout: HeaderLayout): number {
	return layout.fields.reduce((total, field) => total + fixedWidthOf(field.type), 0)
}
