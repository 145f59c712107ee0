/**
 * Derived-asset planning
 *
 * Fills mip 0 from the layers, then runs the derived steps in a fixed order,
 * each reading what the previous ones wrote:
 *
 *   pixels -> mips -> thumbnail -> reflectivity -> transparency flags
 *          -> bump scale -> target format
 *
 * Pixel assignment failures become warnings; anything later is fatal.
 */

import {
	ConversionError,
	errorMessage,
	hasValidLength,
	silentLogger,
	type Logger,
	type PixelAssignmentWarning,
	type RasterImage,
} from '@vtfkit/core'
import { VTF_FORMAT, type VtfCodec, type VtfContainer } from '@vtfkit/vtf'
import type { ExportConfig } from './config'
import type { TextureShape } from './shape'

export interface PlannerInput {
	readonly codec: VtfCodec
	/** Built at the stored size, in RGBA8888 */
	readonly container: VtfContainer
	readonly image: RasterImage
	readonly shape: TextureShape
	readonly config: ExportConfig
	readonly logger?: Logger
}

/**
 * Run every derived-asset step against the container.
 * Returns the pixel warnings; throws DerivedAssetError (carrying them) on failure.
 */
export function planDerivedAssets(input: PlannerInput): PixelAssignmentWarning[] {
	const { codec, container, config, logger = silentLogger } = input
	const warnings = assignBasePixels(input, logger)

	const step = (name: string, fn: () => void): void => {
		try {
			fn()
		} catch (err) {
			throw new ConversionError('DerivedAssetError', `Failed to ${name}: ${errorMessage(err)}`, {
				cause: err,
				warnings,
			})
		}
	}

	const { mipPolicy } = config
	switch (mipPolicy.kind) {
		case 'generate':
			step('generate mipmaps', () => {
				const count = codec.recommendedMipCount(config.imageFormat, container.width, container.height)
				codec.setMipCount(container, count)
				codec.computeMips(container, mipPolicy.filter)
				logger.debug('Generated mipmaps', { count, filter: mipPolicy.filter })
			})
			break
		case 'none':
			step('set mip count', () => codec.setMipCount(container, 1))
			break
	}

	if (config.thumbnailEnabled) {
		step('compute thumbnail', () => codec.computeThumbnail(container, 'default'))
	} else {
		step('remove thumbnail', () => codec.removeThumbnail(container))
	}

	if (config.recomputeReflectivity) {
		step('compute reflectivity', () => codec.computeReflectivity(container))
	}

	step('compute transparency flags', () => codec.computeTransparencyFlags(container))

	step('set bump scale', () => {
		container.bumpScale = config.bumpScale
	})

	step('convert to the target format', () => codec.setFormat(container, config.imageFormat))

	return warnings
}

/**
 * Mip 0 of every (frame, face) cell from its layer, always as RGBA8888.
 * A cell the codec rejects or throws on keeps its zero bytes.
 */
function assignBasePixels(input: PlannerInput, logger: Logger): PixelAssignmentWarning[] {
	const { codec, container, image, shape } = input
	const warnings: PixelAssignmentWarning[] = []

	for (const cell of shape.cells) {
		const layer = image.layers[cell.layer]
		const { width, height, data } = layer.image
		const where = `${layer.name}: could not set pixels for frame ${cell.frame}, face ${cell.face}`

		let reason: string | undefined
		if (!hasValidLength(layer.image)) {
			reason = `${data.length} bytes for ${width}x${height}`
		} else {
			try {
				const stored = codec.setPixels(
					container,
					data,
					VTF_FORMAT.RGBA8888,
					width,
					height,
					'default',
					0,
					cell.frame,
					cell.face,
					0
				)
				if (!stored) reason = `${data.length} bytes for ${width}x${height}`
			} catch (err) {
				reason = errorMessage(err)
			}
		}
		if (reason === undefined) continue

		const warning: PixelAssignmentWarning = {
			kind: 'PixelAssignmentWarning',
			layer: cell.layer,
			frame: cell.frame,
			face: cell.face,
			message: `${where} (${reason})`,
		}
		logger.warn(warning.message, { layer: cell.layer, frame: cell.frame, face: cell.face })
		warnings.push(warning)
	}

	return warnings
}
