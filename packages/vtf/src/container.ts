/**
 * VtfContainer construction and cell addressing
 */

import { getImageSize, getMaximumMipCount, mipDimension } from './formats'
import {
	VTF_CUBE_FACES,
	VTF_CUBE_FACES_WITH_SPHERE,
	VTF_DEFAULT_BUMP_SCALE,
	VTF_DEFAULT_REFLECTIVITY,
	VTF_NO_SPHERE_MAP,
	type VtfContainer,
	type VtfCreationOptions,
	type VtfFormat,
} from './types'

// Width and height are stored as uint16
export const VTF_MAX_DIMENSION = 0xffff

/**
 * Empty container with every cell zero-filled in `format`
 */
export function createContainer(
	format: VtfFormat,
	width: number,
	height: number,
	options: VtfCreationOptions
): VtfContainer {
	const { version, frameCount = 1, faceCount = 1, depth = 1, flags = 0 } = options

	assertDimension('width', width)
	assertDimension('height', height)
	assertDimension('depth', depth)
	if (!Number.isInteger(frameCount) || frameCount < 1 || frameCount > 0xffff) {
		throw new Error(`Invalid frame count: ${frameCount}`)
	}
	if (faceCount !== 1 && faceCount !== VTF_CUBE_FACES && faceCount !== VTF_CUBE_FACES_WITH_SPHERE) {
		throw new Error(`Invalid face count: ${faceCount}`)
	}

	const container: VtfContainer = {
		version,
		width,
		height,
		depth,
		mipCount: 1,
		frameCount,
		faceCount,
		// Six-face cube maps mark the missing sphere map in firstFrame
		firstFrame: faceCount === VTF_CUBE_FACES ? VTF_NO_SPHERE_MAP : 0,
		format,
		flags,
		reflectivity: [...VTF_DEFAULT_REFLECTIVITY],
		bumpScale: VTF_DEFAULT_BUMP_SCALE,
		images: [],
	}
	container.images = allocateImages(container)
	return container
}

function assertDimension(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1 || value > VTF_MAX_DIMENSION) {
		throw new Error(`Invalid ${name}: ${value}`)
	}
}

/**
 * Depth slices stored at a mip level
 */
export function sliceCount(container: VtfContainer, mip: number): number {
	return mipDimension(container.depth, mip)
}

export function cellsPerMip(container: VtfContainer, mip: number): number {
	return container.frameCount * container.faceCount * sliceCount(container, mip)
}

/**
 * Index into `images`: mips outermost (0 first), then frame, face, slice
 */
export function cellIndex(
	container: VtfContainer,
	mip: number,
	frame: number,
	face: number,
	slice: number
): number {
	if (!isCellInRange(container, mip, frame, face, slice)) {
		throw new RangeError(`Cell out of range: mip ${mip}, frame ${frame}, face ${face}, slice ${slice}`)
	}

	let offset = 0
	for (let m = 0; m < mip; m++) {
		offset += cellsPerMip(container, m)
	}
	const slices = sliceCount(container, mip)
	return offset + (frame * container.faceCount + face) * slices + slice
}

export function isCellInRange(
	container: VtfContainer,
	mip: number,
	frame: number,
	face: number,
	slice: number
): boolean {
	return (
		Number.isInteger(mip) &&
		Number.isInteger(frame) &&
		Number.isInteger(face) &&
		Number.isInteger(slice) &&
		mip >= 0 &&
		mip < container.mipCount &&
		frame >= 0 &&
		frame < container.frameCount &&
		face >= 0 &&
		face < container.faceCount &&
		slice >= 0 &&
		slice < sliceCount(container, mip)
	)
}

export function getCell(
	container: VtfContainer,
	mip: number,
	frame: number,
	face: number,
	slice: number
): Uint8Array {
	return container.images[cellIndex(container, mip, frame, face, slice)]
}

export function setCell(
	container: VtfContainer,
	mip: number,
	frame: number,
	face: number,
	slice: number,
	data: Uint8Array
): void {
	const expected = getImageSize(
		container.format,
		mipDimension(container.width, mip),
		mipDimension(container.height, mip)
	)
	if (data.length !== expected) {
		throw new Error(`Cell data has ${data.length} bytes, expected ${expected}`)
	}
	container.images[cellIndex(container, mip, frame, face, slice)] = data
}

/**
 * Change the mip count. Existing levels are kept; new ones start zeroed.
 */
export function resizeMipChain(container: VtfContainer, mipCount: number): void {
	const max = getMaximumMipCount(container.width, container.height, container.depth)
	if (!Number.isInteger(mipCount) || mipCount < 1 || mipCount > max) {
		throw new Error(`Invalid mip count ${mipCount} for ${container.width}x${container.height} (max ${max})`)
	}

	const previous = { ...container }
	container.mipCount = mipCount
	const images = allocateImages(container)

	const keep = Math.min(previous.mipCount, mipCount)
	for (let mip = 0; mip < keep; mip++) {
		forEachCell(container, mip, (frame, face, slice) => {
			images[cellIndex(container, mip, frame, face, slice)] = getCell(previous, mip, frame, face, slice)
		})
	}
	container.images = images
}

/**
 * Visit every (frame, face, slice) of one mip level, frame outermost
 */
export function forEachCell(
	container: VtfContainer,
	mip: number,
	fn: (frame: number, face: number, slice: number) => void
): void {
	const slices = sliceCount(container, mip)
	for (let frame = 0; frame < container.frameCount; frame++) {
		for (let face = 0; face < container.faceCount; face++) {
			for (let slice = 0; slice < slices; slice++) {
				fn(frame, face, slice)
			}
		}
	}
}

function allocateImages(container: VtfContainer): Uint8Array[] {
	const images: Uint8Array[] = []
	for (let mip = 0; mip < container.mipCount; mip++) {
		const size = getImageSize(
			container.format,
			mipDimension(container.width, mip),
			mipDimension(container.height, mip)
		)
		const cells = cellsPerMip(container, mip)
		for (let i = 0; i < cells; i++) {
			images.push(new Uint8Array(size))
		}
	}
	return images
}
