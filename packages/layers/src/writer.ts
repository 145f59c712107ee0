/**
 * Layered image -> VTF bytes
 */

import {
	ConversionError,
	defaultLogger,
	errorMessage,
	isConversionError,
	type Logger,
	type PixelAssignmentWarning,
	type RasterImage,
} from '@vtfkit/core'
import { VTF_FLAG, VTF_FORMAT, vtfCodec, type VtfCodec, type VtfContainer } from '@vtfkit/vtf'
import { DEFAULT_EXPORT_CONFIG, type ExportConfig } from './config'
import { mergeLayers } from './merge'
import { planDerivedAssets } from './planner'
import { validateForEncode } from './validate'

export interface PipelineOptions {
	/** Defaults to the bundled pure TypeScript codec */
	codec?: VtfCodec
	/** Defaults to a console logger at warn level */
	logger?: Logger
}

export interface EncodeResult {
	readonly data: Uint8Array
	/** Cells that kept their zero bytes */
	readonly warnings: readonly PixelAssignmentWarning[]
	readonly container: VtfContainer
}

/**
 * Encode a layered image to a VTF file in memory.
 * Validation runs before the container is built; pixel warnings are returned
 * with the result and attached to any later error.
 */
export function encodeLayers(
	image: RasterImage,
	config: ExportConfig = DEFAULT_EXPORT_CONFIG,
	options: PipelineOptions = {}
): EncodeResult {
	const codec = options.codec ?? vtfCodec
	const logger = options.logger ?? defaultLogger()

	const plan = validateForEncode(image, config, codec, logger)
	const source = config.mergeLayers ? mergeLayers(image) : image

	if (plan.resized) {
		logger.info(`Resizing ${image.width}x${image.height} to ${plan.width}x${plan.height}`, {
			method: config.resizeMethod,
		})
	}

	let flags: number = VTF_FLAG.SRGB
	// Cube faces
	if (plan.shape.faceCount > 1) flags |= VTF_FLAG.ENVMAP

	let container: VtfContainer
	try {
		container = codec.buildContainer(VTF_FORMAT.RGBA8888, plan.width, plan.height, {
			version: config.version,
			frameCount: plan.shape.frameCount,
			faceCount: plan.shape.faceCount,
			flags,
		})
	} catch (err) {
		throw new ConversionError('DerivedAssetError', `Failed to create container: ${errorMessage(err)}`, {
			cause: err,
		})
	}

	const warnings = planDerivedAssets({ codec, container, image: source, shape: plan.shape, config, logger })

	let data: Uint8Array
	try {
		data = codec.serialize(container)
	} catch (err) {
		if (isConversionError(err)) throw err.withWarnings(warnings)
		throw new ConversionError('SerializationError', `Failed to serialize VTF: ${errorMessage(err)}`, {
			cause: err,
			warnings,
		})
	}

	logger.debug('Encoded VTF', {
		bytes: data.length,
		frames: container.frameCount,
		faces: container.faceCount,
		mips: container.mipCount,
		warnings: warnings.length,
	})

	return { data, warnings, container }
}
