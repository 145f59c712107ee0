import { afterEach, describe, expect, it, vi } from 'vitest'
import {
	ConsoleLogger,
	ConversionError,
	createImageData,
	createRasterImage,
	hasValidLength,
	isConversionError,
	layerName,
	type ImageData,
} from './index'

describe('core', () => {
	it('types export correctly', () => {
		const img: ImageData = { width: 1, height: 1, data: new Uint8Array(4) }
		expect(img.width).toBe(1)
	})

	describe('layers', () => {
		it('names layers 1-based with three digits', () => {
			expect(layerName(0)).toBe('Layer 001')
			expect(layerName(41)).toBe('Layer 042')
			expect(layerName(999)).toBe('Layer 1000')
		})

		it('builds a raster image from the first layer size', () => {
			const raster = createRasterImage([createImageData(4, 2), createImageData(4, 2)])
			expect(raster.width).toBe(4)
			expect(raster.height).toBe(2)
			expect(raster.layers.map((l) => l.name)).toEqual(['Layer 001', 'Layer 002'])
		})

		it('reports an empty canvas for no layers', () => {
			const raster = createRasterImage([])
			expect(raster.width).toBe(0)
			expect(raster.layers).toHaveLength(0)
		})

		it('checks buffer length', () => {
			expect(hasValidLength(createImageData(3, 3))).toBe(true)
			expect(hasValidLength({ width: 3, height: 3, data: new Uint8Array(8) })).toBe(false)
		})
	})

	describe('ConversionError', () => {
		it('carries its kind', () => {
			const err = new ConversionError('ShapeMismatch', 'bad shape')
			expect(err).toBeInstanceOf(Error)
			expect(err.kind).toBe('ShapeMismatch')
			expect(err.message).toBe('bad shape')
			expect(err.warnings).toEqual([])
			expect(isConversionError(err)).toBe(true)
			expect(isConversionError(err, 'ShapeMismatch')).toBe(true)
			expect(isConversionError(err, 'ParseError')).toBe(false)
			expect(isConversionError(new Error('x'))).toBe(false)
		})

		it('attaches warnings without losing the kind', () => {
			const warning = {
				kind: 'PixelAssignmentWarning',
				layer: 1,
				frame: 1,
				face: 0,
				message: 'rejected',
			} as const
			const err = new ConversionError('DerivedAssetError', 'mips failed').withWarnings([warning])
			expect(err.kind).toBe('DerivedAssetError')
			expect(err.warnings).toEqual([warning])
		})
	})

	describe('ConsoleLogger', () => {
		afterEach(() => {
			vi.restoreAllMocks()
		})

		it('drops messages below its level', () => {
			const log = vi.spyOn(console, 'log').mockImplementation(() => {})
			const error = vi.spyOn(console, 'error').mockImplementation(() => {})
			const logger = new ConsoleLogger('test', 'warn')

			logger.info('hidden')
			logger.warn('shown', { frame: 2 })

			expect(log).not.toHaveBeenCalled()
			expect(error).toHaveBeenCalledWith('[test] [warn] shown {"frame":2}')
		})
	})
})
