/**
 * Checks run before any container is built
 */

import { ConversionError, silentLogger, type Logger, type RasterImage } from '@vtfkit/core'
import { getResizedDims } from '@vtfkit/transform'
import { formatName, VTF_CUBE_FACES_WITH_SPHERE, VTF_MAX_DIMENSION, type VtfCodec } from '@vtfkit/vtf'
import type { ExportConfig } from './config'
import { assignShape, type TextureShape } from './shape'

export interface EncodePlan {
	readonly shape: TextureShape
	/** Stored size, after power-of-two rounding */
	readonly width: number
	readonly height: number
	readonly resized: boolean
}

// Minor versions that can store a sphere map as a seventh cube face
const SPHERE_MAP_VERSIONS = { min: 1, max: 4 }

/**
 * Validate an image against a config and work out the stored shape and size.
 * Throws DimensionMismatch, ShapeMismatch or UnsupportedFormatForVersion.
 */
export function validateForEncode(
	image: RasterImage,
	config: ExportConfig,
	codec: VtfCodec,
	logger: Logger = silentLogger
): EncodePlan {
	const { width, height } = image

	image.layers.forEach((layer, index) => {
		if (layer.image.width !== width || layer.image.height !== height) {
			throw new ConversionError(
				'DimensionMismatch',
				`${layer.name} (#${index}) is ${layer.image.width}x${layer.image.height}, image is ${width}x${height}`
			)
		}
	})

	// Merged layers export as a single image
	const layerCount = config.mergeLayers ? Math.min(1, image.layers.length) : image.layers.length
	const shape = assignShape(config.imageType, layerCount, logger)

	if (!isDimension(width) || !isDimension(height)) {
		throw new ConversionError('DimensionMismatch', `Invalid image size ${width}x${height}`)
	}

	if (!codec.supportsFormat(config.imageFormat, config.version)) {
		throw new ConversionError(
			'UnsupportedFormatForVersion',
			`${formatName(config.imageFormat)} cannot be stored in a VTF 7.${config.version} file`
		)
	}

	if (
		shape.faceCount === VTF_CUBE_FACES_WITH_SPHERE &&
		(config.version < SPHERE_MAP_VERSIONS.min || config.version > SPHERE_MAP_VERSIONS.max)
	) {
		throw new ConversionError(
			'ShapeMismatch',
			`VTF 7.${config.version} cannot store a sphere map; use 6 layers or a version from 7.${SPHERE_MAP_VERSIONS.min} to 7.${SPHERE_MAP_VERSIONS.max}`
		)
	}

	const target = getResizedDims(width, height, config.resizeMethod)
	if (!isDimension(target.width) || !isDimension(target.height)) {
		throw new ConversionError(
			'DimensionMismatch',
			`Resized size ${target.width}x${target.height} exceeds the VTF limit of ${VTF_MAX_DIMENSION}`
		)
	}

	return {
		shape,
		width: target.width,
		height: target.height,
		resized: target.width !== width || target.height !== height,
	}
}

function isDimension(value: number): boolean {
	return Number.isInteger(value) && value >= 1 && value <= VTF_MAX_DIMENSION
}
