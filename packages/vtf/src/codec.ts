/**
 * VTF codec: the container operations the layer pipelines drive
 */

import { resize, type ResizeFilter } from '@vtfkit/transform'
import { measureAlphaUsage, measureReflectivity, transparencyFlags } from './analysis'
import { cellsPerMip, createContainer, isCellInRange, resizeMipChain } from './container'
import { isVtf, parseVtf } from './decoder'
import { serializeVtf } from './encoder'
import {
	formatName,
	getImageSize,
	getRecommendedMipCount,
	hasAlpha,
	isFormatSupportedAtVersion,
	mipDimension,
} from './formats'
import { generateMips, generateThumbnail, readCell, writeCell } from './mipmaps'
import { canDecodeFormat, canEncodeFormat, convertImage, decodeToRgba } from './pixels'
import { VTF_FLAG, type VtfContainer, type VtfCreationOptions, type VtfFormat } from './types'

/**
 * Pixel and container capabilities. Orchestration code only talks to a
 * container through this interface, so another codec can be plugged in.
 */
export interface VtfCodec {
	parseContainer(data: Uint8Array): VtfContainer
	buildContainer(format: VtfFormat, width: number, height: number, options: VtfCreationOptions): VtfContainer
	/** Cell decoded to RGBA8888 */
	getPixels(container: VtfContainer, mip: number, frame: number, face: number, slice: number): Uint8Array
	/**
	 * Store `data` (in `sourceFormat`, `width` x `height`) into a cell,
	 * resampled with `filter` when the cell size differs.
	 * Returns false when the data cannot be stored; the cell is left untouched.
	 */
	setPixels(
		container: VtfContainer,
		data: Uint8Array,
		sourceFormat: VtfFormat,
		width: number,
		height: number,
		filter: ResizeFilter,
		mip: number,
		frame: number,
		face: number,
		slice: number
	): boolean
	supportsFormat(format: VtfFormat, version: number): boolean
	recommendedMipCount(format: VtfFormat, width: number, height: number): number
	setMipCount(container: VtfContainer, mipCount: number): void
	computeMips(container: VtfContainer, filter: ResizeFilter): void
	computeThumbnail(container: VtfContainer, filter: ResizeFilter): void
	removeThumbnail(container: VtfContainer): void
	computeReflectivity(container: VtfContainer): void
	computeTransparencyFlags(container: VtfContainer): void
	setFormat(container: VtfContainer, format: VtfFormat): void
	serialize(container: VtfContainer): Uint8Array
}

/**
 * Pure TypeScript codec. Decodes every common format including DXT/ATI
 * blocks; encodes every per-pixel format except P8.
 */
export class JsVtfCodec implements VtfCodec {
	canDecode(data: Uint8Array): boolean {
		return isVtf(data)
	}

	parseContainer(data: Uint8Array): VtfContainer {
		return parseVtf(data)
	}

	buildContainer(format: VtfFormat, width: number, height: number, options: VtfCreationOptions): VtfContainer {
		return createContainer(format, width, height, options)
	}

	getPixels(container: VtfContainer, mip: number, frame: number, face: number, slice: number): Uint8Array {
		return readCell(container, mip, frame, face, slice).data
	}

	setPixels(
		container: VtfContainer,
		data: Uint8Array,
		sourceFormat: VtfFormat,
		width: number,
		height: number,
		filter: ResizeFilter,
		mip: number,
		frame: number,
		face: number,
		slice: number
	): boolean {
		if (!isCellInRange(container, mip, frame, face, slice)) return false
		if (width < 1 || height < 1) return false
		if (!canDecodeFormat(sourceFormat) || !canEncodeFormat(container.format)) return false
		if (data.length !== getImageSize(sourceFormat, width, height)) return false

		const rgba = { width, height, data: decodeToRgba(sourceFormat, data, width, height) }
		const image = resize(rgba, mipDimension(container.width, mip), mipDimension(container.height, mip), filter)
		writeCell(container, image, mip, frame, face, slice)
		return true
	}

	supportsFormat(format: VtfFormat, version: number): boolean {
		return isFormatSupportedAtVersion(format, version)
	}

	recommendedMipCount(format: VtfFormat, width: number, height: number): number {
		return getRecommendedMipCount(format, width, height)
	}

	setMipCount(container: VtfContainer, mipCount: number): void {
		resizeMipChain(container, mipCount)
	}

	computeMips(container: VtfContainer, filter: ResizeFilter): void {
		generateMips(container, filter)
	}

	computeThumbnail(container: VtfContainer, filter: ResizeFilter): void {
		generateThumbnail(container, filter)
	}

	removeThumbnail(container: VtfContainer): void {
		delete container.thumbnail
	}

	computeReflectivity(container: VtfContainer): void {
		container.reflectivity = measureReflectivity(container)
	}

	computeTransparencyFlags(container: VtfContainer): void {
		container.flags = transparencyFlags(container.flags, measureAlphaUsage(container))
	}

	/**
	 * Convert every cell to `format`. Formats without alpha drop the alpha flags.
	 */
	setFormat(container: VtfContainer, format: VtfFormat): void {
		if (format === container.format) return
		if (!canDecodeFormat(container.format) || !canEncodeFormat(format)) {
			throw new Error(`Cannot convert ${formatName(container.format)} to ${formatName(format)}`)
		}

		let index = 0
		for (let mip = 0; mip < container.mipCount; mip++) {
			const width = mipDimension(container.width, mip)
			const height = mipDimension(container.height, mip)
			const cells = cellsPerMip(container, mip)
			for (let i = 0; i < cells; i++) {
				container.images[index] = convertImage(container.images[index], container.format, format, width, height)
				index++
			}
		}

		container.format = format
		if (!hasAlpha(format)) {
			container.flags &= ~(VTF_FLAG.ONE_BIT_ALPHA | VTF_FLAG.MULTI_BIT_ALPHA)
		}
	}

	serialize(container: VtfContainer): Uint8Array {
		return serializeVtf(container)
	}
}

export const vtfCodec = new JsVtfCodec()
