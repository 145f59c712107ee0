/**
 * Layer to (frame, face) assignment
 */

import { ConversionError, silentLogger, type Logger } from '@vtfkit/core'
import { VTF_CUBE_FACES, VTF_CUBE_FACES_WITH_SPHERE } from '@vtfkit/vtf'
import type { ImageType } from './config'

export interface CellAssignment {
	/** Position in the layer stack */
	readonly layer: number
	readonly frame: number
	readonly face: number
}

export interface TextureShape {
	readonly imageType: ImageType
	readonly frameCount: number
	readonly faceCount: number
	/** One entry per layer, in layer order */
	readonly cells: readonly CellAssignment[]
}

/**
 * Map a layer count onto frames or faces.
 * Throws ShapeMismatch when the count does not fit the image type.
 */
export function assignShape(imageType: ImageType, layerCount: number, logger: Logger = silentLogger): TextureShape {
	if (!Number.isInteger(layerCount) || layerCount < 1) {
		throw new ConversionError('ShapeMismatch', 'Cannot export an image without layers')
	}

	switch (imageType) {
		case 'standard':
			return asFrames(imageType, layerCount)

		case 'volumetric':
			logger.debug('Volumetric textures are written as frames, one per layer', { layers: layerCount })
			return asFrames(imageType, layerCount)

		case 'envmap': {
			if (layerCount < VTF_CUBE_FACES || layerCount > VTF_CUBE_FACES_WITH_SPHERE) {
				throw new ConversionError(
					'ShapeMismatch',
					`An environment map needs ${VTF_CUBE_FACES} or ${VTF_CUBE_FACES_WITH_SPHERE} layers, got ${layerCount}`
				)
			}
			const faceCount = layerCount < VTF_CUBE_FACES_WITH_SPHERE ? VTF_CUBE_FACES : VTF_CUBE_FACES_WITH_SPHERE
			return {
				imageType,
				frameCount: 1,
				faceCount,
				cells: Array.from({ length: layerCount }, (_, layer) => ({ layer, frame: 0, face: layer })),
			}
		}
	}
}

function asFrames(imageType: ImageType, layerCount: number): TextureShape {
	if (layerCount > 0xffff) {
		throw new ConversionError('ShapeMismatch', `Too many layers for one texture: ${layerCount}`)
	}
	return {
		imageType,
		frameCount: layerCount,
		faceCount: 1,
		cells: Array.from({ length: layerCount }, (_, layer) => ({ layer, frame: layer, face: 0 })),
	}
}
