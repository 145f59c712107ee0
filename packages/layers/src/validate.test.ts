import { createRasterImage, isConversionError, type ImageData, type RasterImage } from '@vtfkit/core'
import { VTF_FORMAT, vtfCodec } from '@vtfkit/vtf'
import { describe, expect, it } from 'vitest'
import { createExportConfig } from './config'
import { validateForEncode } from './validate'

function blank(width: number, height: number): ImageData {
	return { width, height, data: new Uint8Array(width * height * 4) }
}

function layers(count: number, width: number, height: number): RasterImage {
	return createRasterImage(Array.from({ length: count }, () => blank(width, height)))
}

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	throw new Error('Expected an error')
}

describe('validateForEncode', () => {
	it('should round 100x130 by each resize method', () => {
		const image = layers(1, 100, 130)
		const size = (resizeMethod: 'bigger' | 'smaller' | 'nearest') => {
			const plan = validateForEncode(image, createExportConfig({ resizeMethod }), vtfCodec)
			return [plan.width, plan.height, plan.resized]
		}

		expect(size('bigger')).toEqual([128, 256, true])
		expect(size('smaller')).toEqual([64, 128, true])
		expect(size('nearest')).toEqual([128, 128, true])
	})

	it('should keep power of two sizes', () => {
		const plan = validateForEncode(layers(2, 64, 16), createExportConfig(), vtfCodec)
		expect(plan).toMatchObject({ width: 64, height: 16, resized: false })
		expect(plan.shape.frameCount).toBe(2)
	})

	it('should reject layers of different sizes', () => {
		const image: RasterImage = {
			width: 4,
			height: 4,
			layers: [
				{ name: 'Layer 001', image: blank(4, 4) },
				{ name: 'Layer 002', image: blank(4, 2) },
			],
		}
		const err = thrown(() => validateForEncode(image, createExportConfig(), vtfCodec))
		expect(isConversionError(err, 'DimensionMismatch')).toBe(true)
		expect(err instanceof Error && err.message).toBe('Layer 002 (#1) is 4x2, image is 4x4')
	})

	it('should reject formats the version cannot store', () => {
		const config = createExportConfig({ imageFormat: VTF_FORMAT.BC7, version: 4 })
		const err = thrown(() => validateForEncode(layers(1, 4, 4), config, vtfCodec))
		expect(isConversionError(err, 'UnsupportedFormatForVersion')).toBe(true)
		expect(err instanceof Error && err.message).toBe('BC7 cannot be stored in a VTF 7.4 file')
	})

	it('should reject sphere maps outside 7.1 - 7.4', () => {
		const image = layers(7, 4, 4)
		for (const version of [0, 5, 6]) {
			const config = createExportConfig({ imageType: 'envmap', version })
			expect(isConversionError(thrown(() => validateForEncode(image, config, vtfCodec)), 'ShapeMismatch')).toBe(
				true
			)
		}
		const plan = validateForEncode(image, createExportConfig({ imageType: 'envmap', version: 1 }), vtfCodec)
		expect(plan.shape.faceCount).toBe(7)
	})

	it('should allow six-face envmaps at every version', () => {
		const plan = validateForEncode(layers(6, 4, 4), createExportConfig({ imageType: 'envmap', version: 6 }), vtfCodec)
		expect(plan.shape.faceCount).toBe(6)
	})

	it('should reject sizes past the VTF limit after rounding', () => {
		const err = thrown(() => validateForEncode(layers(1, 40000, 1), createExportConfig(), vtfCodec))
		expect(isConversionError(err, 'DimensionMismatch')).toBe(true)
	})

	it('should count merged layers as one', () => {
		const config = createExportConfig({ mergeLayers: true })
		expect(validateForEncode(layers(3, 4, 4), config, vtfCodec).shape.frameCount).toBe(1)
	})

	it('should reject an image without layers', () => {
		const err = thrown(() => validateForEncode(createRasterImage([]), createExportConfig(), vtfCodec))
		expect(isConversionError(err, 'ShapeMismatch')).toBe(true)
	})
})
