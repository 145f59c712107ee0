/**
 * Export configuration
 * Built once per conversion, frozen, and passed down the pipeline by reference.
 */

import { ConversionError } from '@vtfkit/core'
import { POWER_OF_TWO_METHODS, RESIZE_FILTERS, type PowerOfTwoMethod, type ResizeFilter } from '@vtfkit/transform'
import { formatName, isVtfFormat, parseFormatName, VTF_FORMAT, type VtfFormat } from '@vtfkit/vtf'

/**
 * How layers map onto the texture:
 * - standard: one frame per layer
 * - envmap: one cube face per layer (6, or 7 with a sphere map)
 * - volumetric: recognised, currently laid out like standard
 */
export type ImageType = 'standard' | 'envmap' | 'volumetric'

export const IMAGE_TYPES: readonly ImageType[] = ['standard', 'envmap', 'volumetric']

export type MipPolicy = { readonly kind: 'none' } | { readonly kind: 'generate'; readonly filter: ResizeFilter }

export interface ExportConfig {
	/** VTF minor version, 7.0 - 7.6 */
	readonly version: number
	readonly imageFormat: VtfFormat
	readonly imageType: ImageType
	readonly mipPolicy: MipPolicy
	/** Applied only to dimensions that are not powers of two */
	readonly resizeMethod: PowerOfTwoMethod
	readonly thumbnailEnabled: boolean
	readonly recomputeReflectivity: boolean
	/** 0 - 10 */
	readonly bumpScale: number
	/** Flatten every layer into one image before export */
	readonly mergeLayers: boolean
}

export const MIN_VERSION = 0
export const MAX_VERSION = 6
export const MAX_BUMP_SCALE = 10

const DEFAULTS: ExportConfig = {
	version: 4,
	imageFormat: VTF_FORMAT.RGBA8888,
	imageType: 'standard',
	mipPolicy: { kind: 'generate', filter: 'kaiser' },
	resizeMethod: 'bigger',
	thumbnailEnabled: true,
	recomputeReflectivity: true,
	bumpScale: 1,
	mergeLayers: false,
}

/**
 * Validate and freeze a configuration, filling unset options with defaults
 */
export function createExportConfig(options: Partial<ExportConfig> = {}): ExportConfig {
	const config = { ...DEFAULTS, ...options }

	if (!Number.isInteger(config.version) || config.version < MIN_VERSION || config.version > MAX_VERSION) {
		throw invalid(`version must be an integer from ${MIN_VERSION} to ${MAX_VERSION}, got ${config.version}`)
	}
	if (!isVtfFormat(config.imageFormat)) {
		throw invalid(`unknown image format ${formatName(config.imageFormat)}`)
	}
	if (!IMAGE_TYPES.includes(config.imageType)) {
		throw invalid(`unknown image type "${config.imageType}"`)
	}
	if (config.mipPolicy.kind === 'generate' && !RESIZE_FILTERS.includes(config.mipPolicy.filter)) {
		throw invalid(`unknown mipmap filter "${config.mipPolicy.filter}"`)
	}
	if (!POWER_OF_TWO_METHODS.includes(config.resizeMethod)) {
		throw invalid(`unknown resize method "${config.resizeMethod}"`)
	}
	if (!Number.isFinite(config.bumpScale) || config.bumpScale < 0 || config.bumpScale > MAX_BUMP_SCALE) {
		throw invalid(`bump scale must be between 0 and ${MAX_BUMP_SCALE}, got ${config.bumpScale}`)
	}

	return Object.freeze({ ...config, mipPolicy: Object.freeze({ ...config.mipPolicy }) })
}

export const DEFAULT_EXPORT_CONFIG: ExportConfig = createExportConfig()

/**
 * Export options keyed by the string ids of the export dialog
 * (`version: "7_4"`, `image_format: "DXT5"`, `mipmap_filter: "none"`, ...)
 */
export type ExportOptionRecord = Readonly<Record<string, string | number | boolean | undefined>>

/**
 * Build an ExportConfig from dialog-style option ids. Unset keys keep their defaults.
 */
export function parseExportOptions(record: ExportOptionRecord): ExportConfig {
	const options: { -readonly [K in keyof ExportConfig]?: ExportConfig[K] } = {}

	const version = record.version
	if (version !== undefined) options.version = parseVersion(version)

	const imageFormat = record.image_format
	if (imageFormat !== undefined) {
		const format = parseFormatName(String(imageFormat))
		if (format === undefined) throw invalid(`unknown image format "${imageFormat}"`)
		options.imageFormat = format
	}

	const imageType = record.image_type
	if (imageType !== undefined) options.imageType = choice('image type', IMAGE_TYPES, imageType)

	const mipmapFilter = record.mipmap_filter
	if (mipmapFilter !== undefined) {
		options.mipPolicy =
			mipmapFilter === 'none'
				? { kind: 'none' }
				: { kind: 'generate', filter: choice('mipmap filter', RESIZE_FILTERS, mipmapFilter) }
	}

	const resizeMethod = record.resize_method
	if (resizeMethod !== undefined) options.resizeMethod = choice('resize method', POWER_OF_TWO_METHODS, resizeMethod)

	const thumbnail = record.thumbnail_enabled
	if (thumbnail !== undefined) options.thumbnailEnabled = parseBoolean('thumbnail_enabled', thumbnail)

	const merge = record.merge_layers_enabled
	if (merge !== undefined) options.mergeLayers = parseBoolean('merge_layers_enabled', merge)

	const reflectivity = record.recompute_reflectivity_enabled
	if (reflectivity !== undefined) {
		options.recomputeReflectivity = parseBoolean('recompute_reflectivity_enabled', reflectivity)
	}

	const bumpScale = record.bumpmap_scale
	if (bumpScale !== undefined) options.bumpScale = parseNumber('bumpmap_scale', bumpScale)

	return createExportConfig(options)
}

/**
 * Accepts 4, "4", "7_4" and "7.4"
 */
function parseVersion(value: string | number | boolean): number {
	if (typeof value === 'number') return value
	const match = /^(?:7[._])?(\d+)$/.exec(String(value).trim())
	if (!match) throw invalid(`unknown version "${value}"`)
	return Number(match[1])
}

function choice<T extends string>(label: string, values: readonly T[], value: string | number | boolean): T {
	const found = values.find((v) => v === value)
	if (found === undefined) {
		throw invalid(`unknown ${label} "${value}" (expected one of ${values.join(', ')})`)
	}
	return found
}

function parseBoolean(key: string, value: string | number | boolean): boolean {
	if (typeof value === 'boolean') return value
	const text = String(value).trim().toLowerCase()
	if (text === 'true' || text === '1' || text === 'yes') return true
	if (text === 'false' || text === '0' || text === 'no') return false
	throw invalid(`${key} must be a boolean, got "${value}"`)
}

function parseNumber(key: string, value: string | number | boolean): number {
	const parsed = typeof value === 'number' ? value : Number(String(value).trim())
	if (typeof value === 'boolean' || String(value).trim() === '' || Number.isNaN(parsed)) {
		throw invalid(`${key} must be a number, got "${value}"`)
	}
	return parsed
}

function invalid(message: string): ConversionError {
	return new ConversionError('InvalidConfig', `Invalid export config: ${message}`)
}
