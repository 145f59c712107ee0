import {
	createRasterImage,
	isConversionError,
	silentLogger,
	type ImageData,
	type Logger,
	type RasterImage,
} from '@vtfkit/core'
import { JsVtfCodec, parseVtf, VTF_FLAG, VTF_FORMAT, VTF_NO_SPHERE_MAP } from '@vtfkit/vtf'
import { describe, expect, it, vi } from 'vitest'
import { createExportConfig, type ExportConfig } from './config'
import { decodeLayers } from './reader'
import { encodeLayers } from './writer'

const quiet = { logger: silentLogger }

// Fast settings for tests that only look at layout
const layoutOnly: Partial<ExportConfig> = {
	mipPolicy: { kind: 'none' },
	thumbnailEnabled: false,
	recomputeReflectivity: false,
}

function pattern(width: number, height: number, seed: number): ImageData {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < data.length; i++) {
		data[i] = (i * 37 + seed * 11) % 256
	}
	return { width, height, data }
}

function solid(width: number, height: number, rgba: number[]): ImageData {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < data.length; i += 4) data.set(rgba, i)
	return { width, height, data }
}

function stack(count: number, width: number, height: number): RasterImage {
	return createRasterImage(Array.from({ length: count }, (_, i) => pattern(width, height, i)))
}

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	throw new Error('Expected an error')
}

describe('encodeLayers', () => {
	it('should round trip layers losslessly', () => {
		const image = stack(3, 8, 4)
		const { data, warnings } = encodeLayers(image, createExportConfig(), quiet)
		const decoded = decodeLayers(data, quiet)

		expect(warnings).toEqual([])
		expect(decoded.image.width).toBe(8)
		expect(decoded.image.height).toBe(4)
		expect(decoded.image.layers.map((layer) => layer.name)).toEqual(['Layer 001', 'Layer 002', 'Layer 003'])
		decoded.image.layers.forEach((layer, i) => {
			expect(layer.image.data).toEqual(image.layers[i].image.data)
		})
	})

	it('should round trip through other lossless formats', () => {
		const image = createRasterImage([pattern(4, 4, 1)])
		for (const imageFormat of [VTF_FORMAT.BGRA8888, VTF_FORMAT.ABGR8888, VTF_FORMAT.RGBA16161616]) {
			const { data } = encodeLayers(image, createExportConfig({ imageFormat }), quiet)
			expect(decodeLayers(data, quiet).image.layers[0].image.data).toEqual(image.layers[0].image.data)
		}
	})

	it('should write one frame per standard layer', () => {
		const { data } = encodeLayers(stack(3, 4, 4), createExportConfig(layoutOnly), quiet)
		const container = parseVtf(data)
		expect(container.frameCount).toBe(3)
		expect(container.faceCount).toBe(1)
		expect(container.flags & VTF_FLAG.SRGB).toBe(VTF_FLAG.SRGB)
		expect(container.flags & VTF_FLAG.ENVMAP).toBe(0)
	})

	it('should write volumetric layers as frames', () => {
		const { data } = encodeLayers(stack(2, 4, 4), createExportConfig({ ...layoutOnly, imageType: 'volumetric' }), quiet)
		const container = parseVtf(data)
		expect(container.frameCount).toBe(2)
		expect(container.depth).toBe(1)
	})

	describe('environment maps', () => {
		it('should write six layers as a cube map', () => {
			const config = createExportConfig({ ...layoutOnly, imageType: 'envmap' })
			const container = parseVtf(encodeLayers(stack(6, 4, 4), config, quiet).data)
			expect(container.frameCount).toBe(1)
			expect(container.faceCount).toBe(6)
			expect(container.firstFrame).toBe(VTF_NO_SPHERE_MAP)
			expect(container.flags & VTF_FLAG.ENVMAP).toBe(VTF_FLAG.ENVMAP)
		})

		it('should write seven layers with a sphere map', () => {
			const config = createExportConfig({ ...layoutOnly, imageType: 'envmap' })
			const container = parseVtf(encodeLayers(stack(7, 4, 4), config, quiet).data)
			expect(container.faceCount).toBe(7)
			expect(container.firstFrame).toBe(0)
		})

		it('should reject other layer counts', () => {
			const config = createExportConfig({ ...layoutOnly, imageType: 'envmap' })
			for (const count of [5, 8]) {
				expect(isConversionError(thrown(() => encodeLayers(stack(count, 4, 4), config, quiet)), 'ShapeMismatch')).toBe(
					true
				)
			}
		})

		it('should reject sphere maps at 7.5', () => {
			const config = createExportConfig({ ...layoutOnly, imageType: 'envmap', version: 5 })
			const err = thrown(() => encodeLayers(stack(7, 4, 4), config, quiet))
			expect(isConversionError(err, 'ShapeMismatch')).toBe(true)
		})
	})

	describe('mipmaps', () => {
		it('should write a single mip when generation is off', () => {
			const { data } = encodeLayers(stack(1, 64, 64), createExportConfig({ mipPolicy: { kind: 'none' } }), quiet)
			expect(parseVtf(data).mipCount).toBe(1)
		})

		it('should write the recommended chain', () => {
			const config = createExportConfig({ mipPolicy: { kind: 'generate', filter: 'box' } })
			const { data } = encodeLayers(stack(1, 16, 8), config, quiet)
			expect(parseVtf(data).mipCount).toBe(5)
		})
	})

	describe('thumbnail', () => {
		it('should leave the thumbnail out when disabled', () => {
			const image = createRasterImage([solid(4, 4, [10, 20, 30, 255])])
			const { data } = encodeLayers(image, createExportConfig({ thumbnailEnabled: false }), quiet)
			expect(decodeLayers(data, quiet).info.hasThumbnail).toBe(false)
		})

		it('should write a 16 pixel thumbnail when enabled', () => {
			const image = createRasterImage([solid(4, 4, [10, 20, 30, 255])])
			const { data } = encodeLayers(image, createExportConfig(), quiet)
			const container = parseVtf(data)
			expect(container.thumbnail?.width).toBe(16)
			expect(container.thumbnail?.height).toBe(16)
			expect(container.thumbnail?.format).toBe(VTF_FORMAT.RGB888)
		})
	})

	describe('resizing', () => {
		const image = createRasterImage([solid(100, 130, [50, 60, 70, 255])])

		it('should round up to 128x256', () => {
			const container = parseVtf(encodeLayers(image, createExportConfig({ ...layoutOnly, resizeMethod: 'bigger' }), quiet).data)
			expect([container.width, container.height]).toEqual([128, 256])
		})

		it('should round down to 64x128', () => {
			const container = parseVtf(encodeLayers(image, createExportConfig({ ...layoutOnly, resizeMethod: 'smaller' }), quiet).data)
			expect([container.width, container.height]).toEqual([64, 128])
		})

		it('should round to the nearest 128x128', () => {
			const container = parseVtf(encodeLayers(image, createExportConfig({ ...layoutOnly, resizeMethod: 'nearest' }), quiet).data)
			expect([container.width, container.height]).toEqual([128, 128])
		})

		it('should keep a solid color through the resize', () => {
			const { data } = encodeLayers(image, createExportConfig({ ...layoutOnly, resizeMethod: 'nearest' }), quiet)
			const pixels = decodeLayers(data, quiet).image.layers[0].image.data
			expect(Array.from(pixels.subarray(0, 4))).toEqual([50, 60, 70, 255])
			expect(Array.from(pixels.subarray(pixels.length - 4))).toEqual([50, 60, 70, 255])
		})
	})

	describe('derived values', () => {
		it('should store the bump scale', () => {
			const { data } = encodeLayers(stack(1, 4, 4), createExportConfig({ ...layoutOnly, bumpScale: 2.5 }), quiet)
			expect(parseVtf(data).bumpScale).toBe(2.5)
		})

		it('should compute reflectivity when asked', () => {
			const image = createRasterImage([solid(4, 4, [255, 255, 255, 255])])
			const computed = encodeLayers(image, createExportConfig(), quiet).container
			const kept = encodeLayers(image, createExportConfig({ recomputeReflectivity: false }), quiet).container

			expect(computed.reflectivity[0]).toBeCloseTo(1)
			expect(computed.reflectivity[2]).toBeCloseTo(1)
			expect(kept.reflectivity).toEqual([0.5, 0.5, 0.5])
		})

		it('should flag alpha usage', () => {
			const opaque = createRasterImage([solid(2, 2, [1, 2, 3, 255])])
			const binary = createRasterImage([solid(2, 2, [1, 2, 3, 0])])
			const graded = createRasterImage([solid(2, 2, [1, 2, 3, 77])])
			const flags = (image: RasterImage) => encodeLayers(image, createExportConfig(layoutOnly), quiet).container.flags

			expect(flags(opaque) & (VTF_FLAG.ONE_BIT_ALPHA | VTF_FLAG.MULTI_BIT_ALPHA)).toBe(0)
			expect(flags(binary) & VTF_FLAG.ONE_BIT_ALPHA).toBe(VTF_FLAG.ONE_BIT_ALPHA)
			expect(flags(graded) & VTF_FLAG.MULTI_BIT_ALPHA).toBe(VTF_FLAG.MULTI_BIT_ALPHA)
		})

		it('should drop alpha flags for formats without alpha', () => {
			const image = createRasterImage([solid(2, 2, [1, 2, 3, 77])])
			const { container } = encodeLayers(image, createExportConfig({ ...layoutOnly, imageFormat: VTF_FORMAT.RGB888 }), quiet)
			expect(container.format).toBe(VTF_FORMAT.RGB888)
			expect(container.flags).toBe(VTF_FLAG.SRGB)
		})
	})

	describe('failures', () => {
		it('should warn and zero a cell whose pixels are rejected', () => {
			const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
			const broken: ImageData = { width: 4, height: 4, data: new Uint8Array(10) }
			const image = createRasterImage([pattern(4, 4, 0), broken, pattern(4, 4, 2)])

			const { data, warnings } = encodeLayers(image, createExportConfig(), { logger })

			expect(warnings).toEqual([
				{
					kind: 'PixelAssignmentWarning',
					layer: 1,
					frame: 1,
					face: 0,
					message: 'Layer 002: could not set pixels for frame 1, face 0 (10 bytes for 4x4)',
				},
			])
			expect(logger.warn).toHaveBeenCalledTimes(1)

			const layers = decodeLayers(data, quiet).image.layers
			expect(layers.length).toBe(3)
			expect(layers[1].image.data.every((v) => v === 0)).toBe(true)
			expect(layers[2].image.data).toEqual(image.layers[2].image.data)
		})

		it('should keep going when the codec throws for one cell', () => {
			class ThrowingCodec extends JsVtfCodec {
				setPixels(...args: Parameters<JsVtfCodec['setPixels']>): boolean {
					if (args[7] === 1) throw new Error('cell rejected')
					return super.setPixels(...args)
				}
			}
			const image = stack(2, 4, 4)

			const { data, warnings } = encodeLayers(image, createExportConfig(), { codec: new ThrowingCodec(), logger: silentLogger })

			expect(warnings.map((w) => w.message)).toEqual(['Layer 002: could not set pixels for frame 1, face 0 (cell rejected)'])
			const layers = decodeLayers(data, quiet).image.layers
			expect(layers[0].image.data).toEqual(image.layers[0].image.data)
			expect(layers[1].image.data.every((v) => v === 0)).toBe(true)
		})

		it('should reject BC7 before 7.6', () => {
			const config = createExportConfig({ imageFormat: VTF_FORMAT.BC7, version: 4 })
			const err = thrown(() => encodeLayers(stack(1, 4, 4), config, quiet))
			expect(isConversionError(err, 'UnsupportedFormatForVersion')).toBe(true)
		})

		it('should fail the format step for block targets', () => {
			const config = createExportConfig({ ...layoutOnly, imageFormat: VTF_FORMAT.DXT5 })
			const err = thrown(() => encodeLayers(stack(1, 4, 4), config, quiet))
			expect(isConversionError(err, 'DerivedAssetError')).toBe(true)
			expect(err instanceof Error && err.message).toBe(
				'Failed to convert to the target format: Cannot convert RGBA8888 to DXT5'
			)
		})

		it('should attach pixel warnings to a later failure', () => {
			const image = createRasterImage([{ width: 4, height: 4, data: new Uint8Array(3) }])
			const config = createExportConfig({ ...layoutOnly, imageFormat: VTF_FORMAT.DXT1 })
			const err = thrown(() => encodeLayers(image, config, quiet))
			expect(isConversionError(err, 'DerivedAssetError') && err.warnings.length).toBe(1)
		})

		it('should reject layers of different sizes', () => {
			const image: RasterImage = {
				width: 4,
				height: 4,
				layers: [
					{ name: 'Layer 001', image: pattern(4, 4, 0) },
					{ name: 'Layer 002', image: pattern(2, 2, 1) },
				],
			}
			expect(isConversionError(thrown(() => encodeLayers(image, createExportConfig(), quiet)), 'DimensionMismatch')).toBe(
				true
			)
		})

		it('should reject an empty image', () => {
			const err = thrown(() => encodeLayers(createRasterImage([]), createExportConfig(), quiet))
			expect(isConversionError(err, 'ShapeMismatch')).toBe(true)
		})
	})

	it('should merge layers into one frame', () => {
		const bottom = solid(2, 2, [255, 0, 0, 255])
		const top = solid(2, 2, [0, 0, 255, 0])
		const config = createExportConfig({ ...layoutOnly, mergeLayers: true })
		const { data } = encodeLayers(createRasterImage([bottom, top]), config, quiet)
		const decoded = decodeLayers(data, quiet)

		expect(decoded.info.frameCount).toBe(1)
		expect(decoded.image.layers[0].image.data).toEqual(bottom.data)
	})
})
