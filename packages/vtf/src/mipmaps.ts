/**
 * Mip chain and thumbnail generation
 */

import type { ImageData } from '@vtfkit/core'
import { downsample, resize, type ResizeFilter } from '@vtfkit/transform'
import { forEachCell, getCell, setCell, sliceCount } from './container'
import { mipDimension } from './formats'
import { decodeToRgba, encodeFromRgba } from './pixels'
import { VTF_FORMAT, VTF_THUMBNAIL_SIZE, type VtfContainer } from './types'

/**
 * One cell decoded to RGBA8888
 */
export function readCell(
	container: VtfContainer,
	mip: number,
	frame: number,
	face: number,
	slice: number
): ImageData {
	const width = mipDimension(container.width, mip)
	const height = mipDimension(container.height, mip)
	const data = decodeToRgba(container.format, getCell(container, mip, frame, face, slice), width, height)
	return { width, height, data }
}

/**
 * Encode RGBA8888 pixels into one cell
 */
export function writeCell(
	container: VtfContainer,
	image: ImageData,
	mip: number,
	frame: number,
	face: number,
	slice: number
): void {
	setCell(container, mip, frame, face, slice, encodeFromRgba(container.format, image.data, image.width, image.height))
}

/**
 * Fill every level below mip 0, each one resampled from the level above
 */
export function generateMips(container: VtfContainer, filter: ResizeFilter): void {
	for (let mip = 1; mip < container.mipCount; mip++) {
		const parentSlices = sliceCount(container, mip - 1)
		forEachCell(container, mip, (frame, face, slice) => {
			const first = downsample(readCell(container, mip - 1, frame, face, slice * 2), filter)
			// Volume textures halve along depth too
			const image =
				slice * 2 + 1 < parentSlices
					? average(first, downsample(readCell(container, mip - 1, frame, face, slice * 2 + 1), filter))
					: first
			writeCell(container, image, mip, frame, face, slice)
		})
	}
}

function average(a: ImageData, b: ImageData): ImageData {
	const data = new Uint8Array(a.data.length)
	for (let i = 0; i < data.length; i++) {
		data[i] = (a.data[i] + b.data[i] + 1) >> 1
	}
	return { width: a.width, height: a.height, data }
}

/**
 * Thumbnail size: the longer side becomes 16, the other keeps the ratio
 */
export function thumbnailDimensions(width: number, height: number): { width: number; height: number } {
	if (width >= height) {
		return {
			width: VTF_THUMBNAIL_SIZE,
			height: Math.max(1, Math.floor((VTF_THUMBNAIL_SIZE * height) / width)),
		}
	}
	return {
		width: Math.max(1, Math.floor((VTF_THUMBNAIL_SIZE * width) / height)),
		height: VTF_THUMBNAIL_SIZE,
	}
}

/**
 * Build the low-res thumbnail from frame 0, face 0, mip 0, stored as RGB888
 */
export function generateThumbnail(container: VtfContainer, filter: ResizeFilter): void {
	const dims = thumbnailDimensions(container.width, container.height)
	const small = resize(readCell(container, 0, 0, 0, 0), dims.width, dims.height, filter)
	const format = VTF_FORMAT.RGB888
	const data = encodeFromRgba(format, small.data, dims.width, dims.height)
	container.thumbnail = { format, width: dims.width, height: dims.height, data }
}
