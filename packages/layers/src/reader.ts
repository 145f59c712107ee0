/**
 * VTF bytes -> layered image
 */

import {
	ConversionError,
	defaultLogger,
	errorMessage,
	isConversionError,
	layerName,
	type Layer,
	type RasterImage,
} from '@vtfkit/core'
import { formatName, vtfCodec, type VtfContainer, type VtfFormat } from '@vtfkit/vtf'
import { createExportConfig, MAX_BUMP_SCALE, type ExportConfig, type ImageType } from './config'
import type { PipelineOptions } from './writer'

/**
 * File-level facts shown next to the decoded layers
 */
export interface VtfInfo {
	/** Minor version, 7.x */
	readonly version: number
	readonly format: VtfFormat
	readonly formatName: string
	readonly width: number
	readonly height: number
	readonly depth: number
	readonly flags: number
	readonly frameCount: number
	readonly faceCount: number
	readonly mipCount: number
	readonly firstFrame: number
	readonly reflectivity: readonly [number, number, number]
	readonly bumpScale: number
	readonly hasThumbnail: boolean
	readonly imageType: ImageType
}

export interface DecodeResult {
	readonly image: RasterImage
	readonly info: VtfInfo
}

/**
 * Decode every (frame, face) at mip 0, slice 0 into one layer each,
 * frames outermost: frame 0 faces 0..n, then frame 1, ...
 */
export function decodeLayers(data: Uint8Array, options: PipelineOptions = {}): DecodeResult {
	const codec = options.codec ?? vtfCodec
	const logger = options.logger ?? defaultLogger()

	let container: VtfContainer
	try {
		container = codec.parseContainer(data)
	} catch (err) {
		if (isConversionError(err)) throw err
		throw new ConversionError('ParseError', `Invalid VTF: ${errorMessage(err)}`, { cause: err })
	}

	const { width, height } = container
	const layers: Layer[] = []

	for (let frame = 0; frame < container.frameCount; frame++) {
		for (let face = 0; face < container.faceCount; face++) {
			let pixels: Uint8Array
			try {
				pixels = codec.getPixels(container, 0, frame, face, 0)
			} catch (err) {
				throw new ConversionError(
					'ParseError',
					`Cannot decode ${formatName(container.format)} pixels for frame ${frame}, face ${face}: ${errorMessage(err)}`,
					{ cause: err }
				)
			}
			layers.push({ name: layerName(layers.length), image: { width, height, data: pixels } })
		}
	}

	if (container.depth > 1) {
		logger.info('Only the first depth slice of a volume texture is loaded', { depth: container.depth })
	}

	const info = describeContainer(container)
	logger.debug('Decoded VTF', { layers: layers.length, format: info.formatName, version: `7.${info.version}` })

	return { image: { width, height, layers }, info }
}

export function describeContainer(container: VtfContainer): VtfInfo {
	return {
		version: container.version,
		format: container.format,
		formatName: formatName(container.format),
		width: container.width,
		height: container.height,
		depth: container.depth,
		flags: container.flags,
		frameCount: container.frameCount,
		faceCount: container.faceCount,
		mipCount: container.mipCount,
		firstFrame: container.firstFrame,
		reflectivity: [...container.reflectivity],
		bumpScale: container.bumpScale,
		hasThumbnail: container.thumbnail !== undefined,
		imageType: inferImageType(container),
	}
}

function inferImageType(container: VtfContainer): ImageType {
	if (container.faceCount > 1) return 'envmap'
	if (container.depth > 1) return 'volumetric'
	return 'standard'
}

/**
 * Config that writes a loaded file back with its own version, format,
 * layout, mipmaps, thumbnail and bump scale
 */
export function exportConfigFromInfo(info: VtfInfo): ExportConfig {
	const bumpScale = Number.isFinite(info.bumpScale) ? Math.min(MAX_BUMP_SCALE, Math.max(0, info.bumpScale)) : 1
	return createExportConfig({
		version: info.version,
		imageFormat: info.format,
		imageType: info.imageType,
		mipPolicy: info.mipCount > 1 ? { kind: 'generate', filter: 'kaiser' } : { kind: 'none' },
		thumbnailEnabled: info.hasThumbnail,
		bumpScale,
	})
}
