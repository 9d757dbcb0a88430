export { Properties, parseProperties } from '@/mode/properties.js'
export { MapConfigSource, type ConfigSource, type ConfigLookup } from '@/mode/config-source.js'
export { FileConfigSource, type FileConfigSourceOptions } from '@/mode/file-config-source.js'
export {
	ModeResolver,
	getDefaultModeResolver,
	resolveSecureMode,
	resetDefaultModeResolver,
} from '@/mode/mode-resolver.js'
